/**
 * Throttling Types and Interfaces
 * Shared types for the throttled session and its collaborators
 */

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "HEAD", "OPTIONS", "TRACE", "CONNECT", "PATCH"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(method: unknown): method is HttpMethod {
  return typeof method === "string" && HTTP_METHODS.some(candidate => candidate === method);
}

/**
 * A string is matched as a URL prefix, a RegExp as a match anchored at the start of the URL
 */
export type UrlPattern = string | RegExp;

export interface FilterRule {
  readonly method?: HttpMethod;
  readonly pattern: UrlPattern;
}

/**
 * Accepted filter shapes: a bare pattern (any method), a `[method, pattern]` tuple,
 * or a `{ method, pattern }` object. A null or missing method matches every method.
 */
export type FilterSpec =
  | UrlPattern
  | readonly [method: string | null | undefined, pattern: UrlPattern]
  | { readonly method?: string | null; readonly pattern: UrlPattern };

/**
 * The part of the session configuration the filter engine reads on every decision
 */
export interface FilterSettings {
  rateLimit: number;
  limitFiltered: boolean;
}

export interface ThrottleConfig extends FilterSettings, Record<string, unknown> {
  /** requests/sec, 0 disables throttling */
  rateLimit: number;
  /** true: filters name the throttled requests; false: filters name exemptions */
  limitFiltered: boolean;
  /** how long close() waits for the token scheduler to stop */
  shutdownGraceMs: number;
}

export interface ThrottleOptions extends Partial<ThrottleConfig> {
  filters?: readonly FilterSpec[];
}

export interface SessionStats {
  rate: number;
  rateLimit: number;
  count: number;
  errors: number;
}

export type SchedulerRegime = "simple" | "batched";

/**
 * Anything the token scheduler can push admission tokens into
 */
export interface TokenSink {
  put(signal?: AbortSignal): Promise<void>;
}

/**
 * The HTTP capability a session wraps. The session never looks inside
 * requests or responses beyond `isOk`.
 */
export interface HttpTransport<TOptions = unknown, TResponse = unknown> {
  send(method: string, url: string, options?: TOptions): Promise<TResponse>;
  isOk(response: TResponse): boolean;
  /** Signal that should also cancel waiting for admission, if the request options carry one */
  signalOf?(options?: TOptions): AbortSignal | undefined;
}
