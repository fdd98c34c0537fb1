import { BaseService } from "@/common/base/base.service";
import { asError } from "@/common/utils/error.utils";
import { ConfigurationError, ShutdownTimeoutError } from "@/common/errors/throttling.errors";
import { settlesWithin } from "@/common/utils/async.utils";
import { sleepFor } from "@/common/utils/common.utils";
import { DEFAULT_SHUTDOWN_GRACE_MS, queueLengthFor, regimeFor } from "./throttling.constants";
import type { SchedulerRegime, TokenSink } from "./interfaces/throttling.interfaces";

/**
 * Leaky-bucket filler: pushes admission tokens into a sink at a steady
 * long-run rate of `rateLimit` tokens/sec.
 *
 * - simple regime (rate <= 20/s): one token, then sleep 1/rate
 * - batched regime: ceil(ln(rate)) tokens, then sleep batch/rate
 *
 * One instance runs one filler loop; changing the rate means stopping this
 * scheduler and starting another.
 */
export class TokenBucketScheduler extends BaseService {
  readonly regime: SchedulerRegime;
  readonly batchSize: number;
  readonly intervalMs: number;

  private controller?: AbortController;
  private task?: Promise<void>;

  constructor(
    private readonly sink: TokenSink,
    readonly rateLimit: number
  ) {
    super();
    if (!Number.isFinite(rateLimit) || rateLimit <= 0) {
      throw new ConfigurationError(`Token scheduler needs a positive rate limit: ${rateLimit}`, { rateLimit });
    }

    this.regime = regimeFor(rateLimit);
    this.batchSize = queueLengthFor(rateLimit);
    this.intervalMs = (this.batchSize / rateLimit) * 1000;
  }

  get isRunning(): boolean {
    return this.task !== undefined;
  }

  start(): void {
    if (this.task) return;

    const controller = new AbortController();
    this.controller = controller;
    this.task = this.fill(controller.signal);
    this.logDebug(
      `Filling ${this.batchSize} token(s) every ${this.intervalMs.toFixed(1)}ms (${this.regime} regime, ${this.rateLimit} requests/sec)`
    );
  }

  /**
   * Cancel the filler and wait up to `graceMs` for it to finish.
   * Resolves false if it did not stop in time; that is logged, never thrown.
   */
  async stop(graceMs: number = DEFAULT_SHUTDOWN_GRACE_MS): Promise<boolean> {
    const task = this.task;
    if (!task) return true;

    this.controller?.abort();
    this.controller = undefined;
    this.task = undefined;

    const stopped = await settlesWithin(task, graceMs);
    if (!stopped) {
      const timeout = new ShutdownTimeoutError(graceMs);
      this.logWarning(timeout.message, "stop", timeout.toDetails(this.constructor.name));
    }
    return stopped;
  }

  private async fill(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        for (let i = 0; i < this.batchSize; i++) {
          await this.sink.put(signal);
        }
        await sleepFor(this.intervalMs, signal);
      }
    } catch (error) {
      if (signal.aborted) {
        this.logDebug("Cancelled");
        return;
      }
      this.logError(asError(error), "fill");
    }
  }
}
