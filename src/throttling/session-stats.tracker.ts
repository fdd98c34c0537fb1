import { MIN_ELAPSED_SECONDS } from "./throttling.constants";
import type { SessionStats } from "./interfaces/throttling.interfaces";

const STATS_FIELDS = ["rateLimit", "rate", "count", "errors"] as const;

/**
 * Request and error counters for one session.
 * Node runs every completion on the same thread, so plain increments cannot lose updates.
 */
export class SessionStatsTracker {
  private startTime = Date.now();
  private requests = 0;
  private failures = 0;

  get count(): number {
    return this.requests;
  }

  get errors(): number {
    return this.failures;
  }

  get startedAt(): number {
    return this.startTime;
  }

  recordResponse(ok: boolean): void {
    this.requests++;
    if (!ok) this.failures++;
  }

  /**
   * Observed requests/sec since the start or the last reset
   */
  rate(now: number = Date.now()): number {
    const elapsedSeconds = Math.max((now - this.startTime) / 1000, MIN_ELAPSED_SECONDS);
    return this.requests / elapsedSeconds;
  }

  snapshot(rateLimit: number): SessionStats {
    return {
      rate: this.rate(),
      rateLimit,
      count: this.requests,
      errors: this.failures,
    };
  }

  /**
   * Restart the rate window and the request count, returning the stats from before.
   * The error count is kept for the life of the session.
   */
  reset(rateLimit: number): SessionStats {
    const previous = this.snapshot(rateLimit);
    this.startTime = Date.now();
    this.requests = 0;
    return previous;
  }

  describe(rateLimit: number): string {
    return `rate limit: ${SessionStatsTracker.formatRate(rateLimit)}, rate: ${SessionStatsTracker.formatRate(this.rate())}, requests: ${this.requests}, errors: ${this.failures}`;
  }

  static formatRate(rate: number): string {
    if (rate >= 1) {
      return `${rate.toFixed(1)} requests/sec`;
    } else if (rate > 0) {
      return `${(1 / rate).toFixed(1)} secs/request`;
    }
    return "-";
  }

  /**
   * Render a stats snapshot, e.g. one returned by resetCounters()
   */
  static formatStats(stats: Partial<SessionStats>): string {
    const missing = STATS_FIELDS.find(field => typeof stats[field] !== "number");
    if (missing !== undefined) {
      return `Incorrect stats format: ${missing}`;
    }

    const { rateLimit = 0, rate = 0, count = 0, errors = 0 } = stats;
    const rateLimitStr =
      rateLimit >= 1 || rateLimit === 0
        ? `${rateLimit.toFixed(1)} requests/sec`
        : `${(1 / rateLimit).toFixed(1)} secs/request`;

    return `rate limit: ${rateLimitStr}, rate: ${rate.toFixed(1)} request/sec, requests: ${count.toFixed(0)}, errors: ${errors.toFixed(0)}`;
  }
}
