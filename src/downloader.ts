import axios from 'axios';
import type { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import type { HttpClient, SessionCredentials } from './session';
import { toBuffer } from './session';
import type { FetchedResponse } from './types';
import { randomBetween } from './utils';

export interface DownloadClientOptions {
  /** Read before every request, so a re-established session is picked up. */
  credentials: () => SessionCredentials;
  timeoutMs: number;
  /** Attempt ceiling per URL, first try included. */
  maxRetries: number;
  backoffBaseMs: number;
  jitterMs: number;
  adapter?: AxiosAdapter;
}

const IMAGE_ACCEPT = 'image/avif,image/webp,image/apng,image/*,*/*;q=0.8';

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN', 'EPIPE']);

export function isRetryableDownloadError(error: AxiosError): boolean {
  const status = error.response?.status;
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }
  if (error.code === 'ERR_CANCELED') return false;
  // No response at all: transport failure or timeout
  return error.code === undefined || RETRYABLE_CODES.has(error.code) || error.code === 'ERR_NETWORK';
}

/**
 * Image download client. Reuses the gallery session's headers and cookies
 * so downloads look like the same browser, and retries transient failures
 * with exponential backoff.
 */
export class DownloadClient implements HttpClient {
  private readonly http: AxiosInstance;

  constructor(options: DownloadClientOptions) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      responseType: 'arraybuffer',
      // 429 and 5xx become errors so axios-retry sees them; other statuses are answers
      validateStatus: (status) => status < 500 && status !== 429,
      adapter: options.adapter,
    });
    this.http.interceptors.request.use((config) => {
      const { headers, cookie } = options.credentials();
      config.headers.set(headers);
      config.headers.set('Accept', IMAGE_ACCEPT);
      if (cookie) {
        config.headers.set('Cookie', cookie);
      } else {
        config.headers.delete('Cookie');
      }
      return config;
    });

    axiosRetry(this.http, {
      retries: Math.max(0, options.maxRetries - 1),
      shouldResetTimeout: true,
      retryDelay: (retryCount) =>
        options.backoffBaseMs * 2 ** (retryCount - 1) + randomBetween(0, options.jitterMs),
      retryCondition: isRetryableDownloadError,
      onRetry: (retryCount, error, requestConfig) => {
        console.log(`  🔄 Retry ${retryCount}/${options.maxRetries - 1} for ${requestConfig.url}: ${error.message}`);
      },
    });
  }

  async fetch(url: string): Promise<FetchedResponse> {
    const res = await this.http.get<unknown>(url);
    return {
      url,
      status: res.status,
      contentType: String(res.headers['content-type'] ?? ''),
      body: toBuffer(res.data),
    };
  }
}
