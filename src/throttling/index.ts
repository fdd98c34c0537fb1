export * from "./interfaces/throttling.interfaces";
export * from "./throttling.constants";
export { AdmissionQueue } from "./admission-queue";
export { TokenBucketScheduler } from "./token-bucket.scheduler";
export { UrlFilterEngine, toFilterRule } from "./url-filter.engine";
export { SessionStatsTracker } from "./session-stats.tracker";
export { ThrottledSession } from "./throttled-session.service";
export { AxiosHttpTransport } from "./transports/axios-http.transport";
export { createThrottledSession, type AxiosThrottledSession, type ThrottledSessionOptions } from "./throttled-session.factory";
export { ThrottlingModule } from "./throttling.module";
