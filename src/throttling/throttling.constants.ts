import type { SchedulerRegime, ThrottleConfig } from "./interfaces/throttling.interfaces";

/**
 * Rates above this many requests/sec switch the scheduler to batched filling
 */
export const LOG_FILLER = 20;

export const DEFAULT_SHUTDOWN_GRACE_MS = 500;

// lower bound on elapsed time when deriving the observed rate
export const MIN_ELAPSED_SECONDS = 0.001;

export const DEFAULT_THROTTLE_CONFIG: ThrottleConfig = {
  rateLimit: 0,
  limitFiltered: false,
  shutdownGraceMs: DEFAULT_SHUTDOWN_GRACE_MS,
};

// Injection tokens
export const THROTTLED_SESSION = "THROTTLED_SESSION";
export const THROTTLING_OPTIONS = "THROTTLING_OPTIONS";

export function regimeFor(rateLimit: number): SchedulerRegime {
  return rateLimit > LOG_FILLER ? "batched" : "simple";
}

/**
 * Admission queue capacity for a rate: 1 up to LOG_FILLER, ceil(ln(rate)) above it
 */
export function queueLengthFor(rateLimit: number): number {
  return regimeFor(rateLimit) === "batched" ? Math.ceil(Math.log(rateLimit)) : 1;
}
