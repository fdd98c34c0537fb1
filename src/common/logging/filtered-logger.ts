import { Logger } from "@nestjs/common";
import { ENV } from "@/config/environment.constants";
import { shouldLog, type LogLevel } from "../types/logging";

/**
 * A NestJS Logger that automatically filters messages based on LOG_LEVEL
 * This makes log level filtering transparent to calling code
 */
export class FilteredLogger extends Logger {
  private readonly currentLogLevel: LogLevel;

  constructor(context: string, logLevel: LogLevel = ENV.LOGGING.LOG_LEVEL) {
    super(context);
    this.currentLogLevel = logLevel;
  }

  getLogLevel(): LogLevel {
    return this.currentLogLevel;
  }

  override log(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("log", this.currentLogLevel)) {
      super.log(message, ...optionalParams);
    }
  }

  override error(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("error", this.currentLogLevel)) {
      super.error(message, ...optionalParams);
    }
  }

  override warn(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("warn", this.currentLogLevel)) {
      super.warn(message, ...optionalParams);
    }
  }

  override debug(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("debug", this.currentLogLevel)) {
      super.debug(message, ...optionalParams);
    }
  }

  override verbose(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("verbose", this.currentLogLevel)) {
      super.verbose(message, ...optionalParams);
    }
  }

  override fatal(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("fatal", this.currentLogLevel)) {
      super.error(`[FATAL] ${String(message)}`, ...optionalParams);
    }
  }
}
