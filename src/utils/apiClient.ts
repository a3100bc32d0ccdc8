import axios, { AxiosInstance } from 'axios';
import { Logger } from '../services/Logger';

/**
 * The slice of an axios instance the downloader needs; tests pass a stub.
 */
export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface ExchangeClientOptions {
  baseURL: string;
  timeoutMs: number;
}

// Create axios instance for the public market data endpoints
export function createExchangeClient(options: ExchangeClientOptions, logger: Logger): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      Accept: 'application/json'
    },
    // Status codes are classified by the callers
    validateStatus: () => true
  });

  client.interceptors.response.use(
    async (response) => {
      await logger.debug('HTTP', `${response.config.method?.toUpperCase()} ${response.config.url} -> ${response.status}`, {
        params: response.config.params
      });
      return response;
    },
    (error) => Promise.reject(error)
  );

  return client;
}
