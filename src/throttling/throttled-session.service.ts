import type { OnModuleDestroy } from "@nestjs/common";
import { ConfigurableService } from "@/common/base/composed.service";
import { ConfigurationError, SessionClosedError } from "@/common/errors/throttling.errors";
import { AdmissionQueue } from "./admission-queue";
import { SessionStatsTracker } from "./session-stats.tracker";
import { TokenBucketScheduler } from "./token-bucket.scheduler";
import { UrlFilterEngine } from "./url-filter.engine";
import { DEFAULT_THROTTLE_CONFIG, queueLengthFor } from "./throttling.constants";
import type {
  FilterRule,
  HttpMethod,
  HttpTransport,
  SessionStats,
  ThrottleConfig,
  ThrottleOptions,
  UrlPattern,
} from "./interfaces/throttling.interfaces";

/**
 * Rate-limited HTTP session.
 *
 * Wraps an {@link HttpTransport}: every request is checked against the URL
 * filters, waits for an admission token when throttled, is sent through the
 * transport and then counted. Responses are returned untouched; transport
 * exceptions propagate uncounted and are never retried here.
 *
 * @example
 * const session = new ThrottledSession(new AxiosHttpTransport(), {
 *   rateLimit: 5,
 *   filters: [["GET", "https://itunes.apple.com/"]],
 * });
 * const response = await session.get("https://ws.audioscrobbler.com/2.0", { params });
 * await session.close();
 */
export class ThrottledSession<TOptions = unknown, TResponse = unknown>
  extends ConfigurableService<ThrottleConfig>(DEFAULT_THROTTLE_CONFIG)
  implements OnModuleDestroy
{
  private readonly queue: AdmissionQueue;
  private readonly stats: SessionStatsTracker;
  private readonly filterEngine: UrlFilterEngine;
  private readonly retiringSchedulers = new Set<Promise<boolean>>();
  private scheduler?: TokenBucketScheduler;
  private closed = false;

  constructor(
    private readonly transport: HttpTransport<TOptions, TResponse>,
    options: ThrottleOptions = {}
  ) {
    super();
    this.queue = new AdmissionQueue(1);
    this.stats = new SessionStatsTracker();
    this.filterEngine = new UrlFilterEngine(() => this.config, options.filters ?? []);

    this.updateConfig({
      rateLimit: options.rateLimit ?? DEFAULT_THROTTLE_CONFIG.rateLimit,
      limitFiltered: options.limitFiltered ?? DEFAULT_THROTTLE_CONFIG.limitFiltered,
      shutdownGraceMs: options.shutdownGraceMs ?? DEFAULT_THROTTLE_CONFIG.shutdownGraceMs,
    });

    this.logInitialization(
      `Throttled session ready: rate limit ${this.rateLimitString}, ${this.filterEngine.filters.length} filter(s)`
    );
  }

  override validateConfig(): void {
    const { rateLimit, limitFiltered, shutdownGraceMs } = this.config;

    if (typeof rateLimit !== "number" || !Number.isFinite(rateLimit) || rateLimit < 0) {
      throw new ConfigurationError(`rate_limit has to be a non-negative number: ${String(rateLimit)}`, { rateLimit });
    }
    if (typeof limitFiltered !== "boolean") {
      throw new ConfigurationError(`limit_filtered has to be bool: ${String(limitFiltered)}`, { limitFiltered });
    }
    if (typeof shutdownGraceMs !== "number" || !Number.isFinite(shutdownGraceMs) || shutdownGraceMs < 0) {
      throw new ConfigurationError(`shutdown grace period has to be a non-negative number: ${String(shutdownGraceMs)}`, {
        shutdownGraceMs,
      });
    }
  }

  override onConfigUpdated(oldConfig: ThrottleConfig, newConfig: ThrottleConfig): void {
    if (oldConfig.rateLimit !== newConfig.rateLimit) {
      this.restartScheduler(newConfig.rateLimit);
    }
  }

  // Statistics

  get rateLimit(): number {
    return this.config.rateLimit;
  }

  get rateLimitString(): string {
    return SessionStatsTracker.formatRate(this.rateLimit);
  }

  get rate(): number {
    return this.stats.rate();
  }

  get rateString(): string {
    return SessionStatsTracker.formatRate(this.rate);
  }

  get count(): number {
    return this.stats.count;
  }

  get errors(): number {
    return this.stats.errors;
  }

  get statsString(): string {
    return this.stats.describe(this.rateLimit);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get filters(): readonly FilterRule[] {
    return this.filterEngine.filters;
  }

  /** Admission queue capacity: 1, or ceil(ln(rate)) above the simple regime */
  get queueLength(): number {
    return this.queue.capacity;
  }

  getStats(): SessionStats {
    return this.stats.snapshot(this.rateLimit);
  }

  /**
   * Restart the rate window and request count; returns the stats from before the reset
   */
  resetCounters(): SessionStats {
    return this.stats.reset(this.rateLimit);
  }

  static formatStats(stats: Partial<SessionStats>): string {
    return SessionStatsTracker.formatStats(stats);
  }

  // Throttling

  addFilter(pattern: UrlPattern, method?: HttpMethod | string | null): FilterRule {
    return this.filterEngine.addFilter(pattern, method);
  }

  isLimited(method: string, url: string): boolean {
    return this.filterEngine.isLimited(method, url);
  }

  matchingRule(method: HttpMethod, url: string): FilterRule | undefined {
    return this.filterEngine.matchingRule(method, url);
  }

  /**
   * Change the rate limit. The token scheduler restarts under the new rate;
   * requests already waiting stay in line. A rate of 0 lets them all through.
   */
  setRateLimit(rateLimit: number): number {
    this.updateConfig({ rateLimit });
    return this.rateLimit;
  }

  // Requests

  async request(method: string, url: string, options?: TOptions): Promise<TResponse> {
    if (this.closed) {
      throw new SessionClosedError();
    }

    const httpMethod = method.toUpperCase();
    if (this.isLimited(httpMethod, url)) {
      await this.queue.get(this.transport.signalOf?.(options));
    }

    const response = await this.transport.send(httpMethod, url, options);
    this.stats.recordResponse(this.transport.isOk(response));
    return response;
  }

  get(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("GET", url, options);
  }

  post(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("POST", url, options);
  }

  put(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("PUT", url, options);
  }

  patch(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("PATCH", url, options);
  }

  delete(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("DELETE", url, options);
  }

  head(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("HEAD", url, options);
  }

  options(url: string, options?: TOptions): Promise<TResponse> {
    return this.request("OPTIONS", url, options);
  }

  // Lifecycle

  /**
   * Stop the token scheduler, waiting at most `shutdownGraceMs`.
   * Requests still waiting for admission fail with SessionClosedError.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.logDebug(this.statsString, "close");

    const scheduler = this.scheduler;
    this.scheduler = undefined;
    if (scheduler) {
      this.retire(scheduler);
    }
    this.queue.rejectConsumers(new SessionClosedError());

    await Promise.all(this.retiringSchedulers);
    this.logShutdown(`Throttled session closed (${this.statsString})`);
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  private restartScheduler(rateLimit: number): void {
    if (this.scheduler) {
      this.retire(this.scheduler);
      this.scheduler = undefined;
    }

    // the queue outlives schedulers so waiting requests keep their place
    this.queue.resize(queueLengthFor(rateLimit));

    if (rateLimit === 0) {
      const released = this.queue.releaseConsumers();
      this.logger.log(`Throttling disabled${released > 0 ? `, released ${released} waiting request(s)` : ""}`);
      return;
    }
    if (this.closed) return;

    const scheduler = new TokenBucketScheduler(this.queue, rateLimit);
    this.scheduler = scheduler;
    scheduler.start();
    this.logger.log(
      `Rate limit set to ${this.rateLimitString} (${scheduler.regime} regime, queue length ${this.queue.capacity})`
    );
  }

  // stop() aborts synchronously, so the retired filler can no longer deliver tokens
  private retire(scheduler: TokenBucketScheduler): void {
    const stopping = scheduler.stop(this.config.shutdownGraceMs);
    this.retiringSchedulers.add(stopping);
    void stopping.finally(() => this.retiringSchedulers.delete(stopping));
  }
}
