import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse, type CreateAxiosDefaults } from "axios";
import type { HttpTransport } from "../interfaces/throttling.interfaces";

/**
 * HTTP transport backed by an axios instance.
 *
 * Every status resolves (non-2xx responses are returned, not thrown) unless
 * the request options bring their own `validateStatus`. Network failures and
 * timeouts still reject with the axios error.
 */
export class AxiosHttpTransport implements HttpTransport<AxiosRequestConfig, AxiosResponse<unknown>> {
  readonly client: AxiosInstance;

  constructor(client: AxiosInstance | CreateAxiosDefaults = {}) {
    this.client = isAxiosInstance(client) ? client : axios.create(client);
  }

  send(method: string, url: string, options: AxiosRequestConfig = {}): Promise<AxiosResponse<unknown>> {
    return this.client.request<unknown>({
      validateStatus: () => true,
      ...options,
      method,
      url,
    });
  }

  isOk(response: AxiosResponse<unknown>): boolean {
    return response.status >= 200 && response.status < 300;
  }

  signalOf(options?: AxiosRequestConfig): AbortSignal | undefined {
    const signal = options?.signal;
    return signal instanceof AbortSignal ? signal : undefined;
  }
}

function isAxiosInstance(value: AxiosInstance | CreateAxiosDefaults): value is AxiosInstance {
  return typeof value === "function" && "request" in value;
}
