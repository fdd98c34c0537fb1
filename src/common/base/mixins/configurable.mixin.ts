import type { Logger } from "@nestjs/common";
import type { AbstractConstructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Configuration management capabilities
 */
export interface ConfigurableCapabilities<TConfig extends Record<string, unknown>> {
  updateConfig(newConfig: Partial<TConfig>): void;
  getConfig(): Readonly<TConfig>;
  resetConfig(): void;
  validateConfig(): void;
  onConfigUpdated?(oldConfig: TConfig, newConfig: TConfig): void;
}

type LoggingHost = Pick<LoggingCapabilities, "logError"> & { readonly logger: Logger };

/**
 * Mixin that adds configuration management to a service.
 * Apply on top of WithLogging: updates are logged and failed validations roll back.
 */
export function WithConfiguration<TConfig extends Record<string, unknown>>(defaultConfig: TConfig) {
  return function <TBase extends AbstractConstructor<LoggingHost>>(Base: TBase) {
    abstract class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig;
      public readonly defaultConfig: TConfig;

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
        this.defaultConfig = { ...defaultConfig };
        this.config = { ...defaultConfig };
      }

      updateConfig(newConfig: Partial<TConfig>): void {
        const oldConfig = { ...this.config };
        this.config = { ...this.config, ...newConfig };

        try {
          this.validateConfig();
        } catch (error) {
          // Rollback on validation failure
          this.config = oldConfig;
          if (error instanceof Error) {
            this.logError(error, "Configuration update failed, rolled back");
          }
          throw error;
        }

        this.onConfigUpdated?.(oldConfig, this.config);
        this.logger.debug("Configuration updated", {
          service: this.constructor.name,
          changes: this.getConfigChanges(oldConfig, this.config),
        });
      }

      getConfig(): Readonly<TConfig> {
        return { ...this.config };
      }

      resetConfig(): void {
        const oldConfig = { ...this.config };
        this.config = { ...this.defaultConfig };
        this.onConfigUpdated?.(oldConfig, this.config);
        this.logger.log("Configuration reset to defaults");
      }

      validateConfig(): void {
        // Override in subclasses for specific validation
      }

      onConfigUpdated?(_oldConfig: TConfig, _newConfig: TConfig): void;

      public getConfigChanges(oldConfig: TConfig, newConfig: TConfig): Record<string, { old: unknown; new: unknown }> {
        const changes: Record<string, { old: unknown; new: unknown }> = {};

        for (const key in newConfig) {
          if (oldConfig[key] !== newConfig[key]) {
            changes[key] = { old: oldConfig[key], new: newConfig[key] };
          }
        }

        return changes;
      }
    }

    return ConfigurableMixin;
  };
}
