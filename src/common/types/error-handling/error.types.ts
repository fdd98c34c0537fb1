/**
 * Defines the severity levels for errors, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Error codes raised by the throttled session and its collaborators
 */
export enum ErrorCode {
  // Generic errors
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",

  // Admission control
  INVALID_HTTP_METHOD = "INVALID_HTTP_METHOD",
  ADMISSION_ABORTED = "ADMISSION_ABORTED",

  // Session lifecycle
  SESSION_CLOSED = "SESSION_CLOSED",
  SHUTDOWN_TIMEOUT = "SHUTDOWN_TIMEOUT",
}

/**
 * Base interface for all error details.
 */
export interface IErrorDetails extends Record<string, unknown> {
  /**
   * Machine-readable error code
   */
  code: ErrorCode;

  /**
   * Human-readable error message
   */
  message: string;

  severity: ErrorSeverity;

  /**
   * Optional module name where the error originated
   */
  module?: string;

  timestamp?: number;

  /**
   * Optional additional context about the error
   */
  context?: Record<string, unknown>;
}
