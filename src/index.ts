import "reflect-metadata";

export * from "./throttling";
export * from "./common/errors/throttling.errors";
export { ENV, ENV_HELPERS, loadThrottleOptions, parseFilterList } from "./config";
