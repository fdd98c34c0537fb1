import { ErrorCode, ErrorSeverity, type IErrorDetails } from "../types/error-handling";

/**
 * Base class for errors raised by the throttled session
 */
export abstract class ThrottlingError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly severity: ErrorSeverity;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toDetails(module?: string): IErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      module,
      timestamp: Date.now(),
      context: this.context,
    };
  }
}

/**
 * Invalid constructor arguments, filters or rate limits
 */
export class ConfigurationError extends ThrottlingError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly severity = ErrorSeverity.HIGH;
}

/**
 * Raised inside the filter engine for a method outside the HTTP method set.
 * Never leaves the engine: it is logged and the request is throttled.
 */
export class InvalidMethodError extends ThrottlingError {
  readonly code = ErrorCode.INVALID_HTTP_METHOD;
  readonly severity = ErrorSeverity.MEDIUM;

  constructor(public readonly method: unknown) {
    super(`'method' is not a valid HTTP method: ${String(method)}`, { method });
  }
}

export class ShutdownTimeoutError extends ThrottlingError {
  readonly code = ErrorCode.SHUTDOWN_TIMEOUT;
  readonly severity = ErrorSeverity.LOW;

  constructor(public readonly graceMs: number) {
    super(`Timeout while cancelling bucket filler after ${graceMs}ms`, { graceMs });
  }
}

export class SessionClosedError extends ThrottlingError {
  readonly code = ErrorCode.SESSION_CLOSED;
  readonly severity = ErrorSeverity.MEDIUM;

  constructor() {
    super("Throttled session is closed");
  }
}

/**
 * A caller stopped waiting for an admission token
 */
export class AdmissionAbortedError extends ThrottlingError {
  readonly code = ErrorCode.ADMISSION_ABORTED;
  readonly severity = ErrorSeverity.LOW;

  constructor(reason?: unknown) {
    super("Waiting for admission was aborted", undefined, { cause: reason });
  }
}

export function isThrottlingError(error: unknown): error is ThrottlingError {
  return error instanceof ThrottlingError;
}
