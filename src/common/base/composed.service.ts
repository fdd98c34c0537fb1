import { LoggingBase } from "./base.service";
import { WithConfiguration } from "./mixins/configurable.mixin";

/**
 * Build a logging service base that also manages a typed configuration.
 *
 * @example
 * class Session extends ConfigurableService<SessionConfig>({ rateLimit: 0 }) {}
 */
export function ConfigurableService<TConfig extends Record<string, unknown>>(defaultConfig: TConfig) {
  return WithConfiguration<TConfig>(defaultConfig)(LoggingBase);
}
