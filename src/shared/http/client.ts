// Axios HTTP client factory
// Centralizes headers and timeout for image downloads. Tests pass an adapter.
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";

export interface HttpOptions {
  userAgent: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

export function createHttp(opts: HttpOptions): AxiosInstance {
  return axios.create({
    timeout: opts.timeoutMs,
    headers: { "User-Agent": opts.userAgent, ...opts.headers },
    maxRedirects: 5,
    adapter: opts.adapter,
  });
}
