// node/src/services/http.ts: JSON over HTTP for the provider adapters

import axios from 'axios';
import { WorkerError } from '@/bus/envelope';

export interface FetchOptions {
  method?: 'GET' | 'POST';
  params?: Record<string, string | number | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/** Returns the parsed response body; adapters validate it with zod. */
export type JsonFetcher = (url: string, options?: FetchOptions) => Promise<unknown>;

export const axiosJsonFetcher: JsonFetcher = async (url, options = {}) => {
  try {
    const response = await axios.request<unknown>({
      url,
      method: options.method ?? 'GET',
      params: options.params,
      data: options.body,
      headers: options.headers,
      timeout: options.timeoutMs ?? 10000,
    });
    return response.data;
  } catch (err: unknown) {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status === undefined) {
        throw new WorkerError(`${url}: ${err.message}`, 'NETWORK_ERROR', true);
      }
      throw new WorkerError(`${url}: HTTP ${status}`, `HTTP_${status}`, status === 429 || status >= 500);
    }
    throw err;
  }
};
