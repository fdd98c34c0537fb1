import { FilteredLogger } from "../../logging/filtered-logger";
import type { Constructor, AbstractConstructor } from "../../types/services/mixins";

/**
 * Logging capabilities interface
 */
export interface LoggingCapabilities {
  logInitialization(message?: string): void;
  logShutdown(message?: string): void;
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
}

/**
 * Mixin that adds logging capabilities to a service
 */
export function WithLogging<TBase extends Constructor | AbstractConstructor>(Base: TBase) {
  return class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: FilteredLogger;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new FilteredLogger(this.constructor.name);
    }

    logInitialization(message?: string): void {
      const defaultMessage = `${this.constructor.name} initialized`;
      this.logger.log(message || defaultMessage);
    }

    logShutdown(message?: string): void {
      const defaultMessage = `${this.constructor.name} shutting down`;
      this.logger.log(message || defaultMessage);
    }

    logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.error(`${contextMessage}${error.message}`, error.stack, additionalData);
      } else {
        this.logger.error(`${contextMessage}${error.message}`, error.stack);
      }
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.warn(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.warn(`${contextMessage}${message}`);
      }
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData !== undefined) {
        this.logger.debug(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.debug(`${contextMessage}${message}`);
      }
    }
  };
}
