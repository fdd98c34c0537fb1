import type { AxiosRequestConfig, AxiosResponse, CreateAxiosDefaults } from "axios";
import { ENV } from "@/config/environment.constants";
import { ThrottledSession } from "./throttled-session.service";
import { AxiosHttpTransport } from "./transports/axios-http.transport";
import type { ThrottleOptions } from "./interfaces/throttling.interfaces";

export type AxiosThrottledSession = ThrottledSession<AxiosRequestConfig, AxiosResponse<unknown>>;

export interface ThrottledSessionOptions extends ThrottleOptions {
  /** defaults for the underlying axios instance */
  http?: CreateAxiosDefaults;
}

/**
 * Create a throttled session over a fresh axios instance
 */
export function createThrottledSession(options: ThrottledSessionOptions = {}): AxiosThrottledSession {
  const { http, ...throttle } = options;
  const transport = new AxiosHttpTransport({ timeout: ENV.TIMEOUTS.HTTP_MS, ...http });
  return new ThrottledSession(transport, throttle);
}
