/**
 * Retrying HTTP Fetcher
 *
 * GET with a per-attempt timeout and a constant delay between attempts.
 */

import axios, { type AxiosInstance } from 'axios';
import { withRetry } from '../utils/retry.js';
import { FetchError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface FetcherOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  userAgent: string;
}

export interface DocumentFetcher {
  fetch(url: string, maxRetries?: number): Promise<Buffer>;
}

export class HttpFetcher implements DocumentFetcher {
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly options: FetcherOptions,
    deps: { client?: AxiosInstance; logger?: Logger } = {}
  ) {
    this.client = deps.client ?? axios.create();
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Download url, retrying up to maxRetries attempts in total.
   * Non-2xx responses count as failures.
   */
  async fetch(url: string, maxRetries: number = this.options.maxRetries): Promise<Buffer> {
    try {
      return await withRetry(
        async (attempt) => {
          this.logger.info({ url, attempt, maxRetries }, 'Downloading');
          const response = await this.client.get<ArrayBuffer>(url, {
            responseType: 'arraybuffer',
            timeout: this.options.timeoutMs,
            headers: { 'User-Agent': this.options.userAgent },
          });
          return Buffer.from(response.data);
        },
        {
          maxAttempts: maxRetries,
          initialDelayMs: this.options.retryDelayMs,
          maxDelayMs: this.options.retryDelayMs,
          factor: 1,
        },
        this.logger
      );
    } catch (error) {
      throw new FetchError(url, maxRetries, error);
    }
  }
}
