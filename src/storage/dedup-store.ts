/**
 * Dedup Store
 *
 * Records which bulletin URLs have been ingested. The key is derived from
 * the URL string only, so a URL whose content changes upstream is not
 * ingested again.
 */

import crypto from 'crypto';
import { StoreError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { AdvisoryResult } from '../types/index.js';
import type { ObjectStore } from './object-store.js';

/**
 * md5 hex digest of the URL's UTF-8 bytes
 */
export function fingerprint(url: string): string {
  return crypto.createHash('md5').update(url, 'utf-8').digest('hex');
}

export function markerKey(url: string): string {
  return `processed/${fingerprint(url)}.txt`;
}

export class DedupStore {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly store: ObjectStore,
    options: { clock?: () => Date; logger?: Logger } = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Rejects with StoreError on any backend failure other than "not found"
   */
  async isProcessed(url: string): Promise<boolean> {
    return this.store.exists(markerKey(url));
  }

  /**
   * Best effort: a failed write is logged and returned, never thrown
   */
  async markProcessed(url: string): Promise<AdvisoryResult> {
    const key = markerKey(url);
    const body = `Processed: ${this.clock().toISOString()}\nURL: ${url}`;

    try {
      await this.store.put(key, body, 'text/plain');
      return { ok: true };
    } catch (error) {
      const failure =
        error instanceof StoreError
          ? error
          : new StoreError(`Failed to write marker: ${errorMessage(error)}`, key, error);
      this.logger.warn({ url, key, error: failure.message }, 'Failed to mark bulletin as processed');
      return { ok: false, error: failure };
    }
  }
}
