/**
 * Config Module Exports
 */

export { ENV, ENV_HELPERS } from "./environment.constants";
export { loadThrottleOptions, parseFilterList, type ThrottlingEnv } from "./throttle-config.loader";
