/**
 * Durable copies of bulletins and run logs
 */

import { formatDateStamp, formatTimestamp } from '../utils/dates.js';
import { StoreError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { AdvisoryResult, RunStatus } from '../types/index.js';
import type { ObjectStore } from './object-store.js';

export function archiveKey(date: Date, filename: string): string {
  return `boletines/${formatDateStamp(date)}/${filename}`;
}

export function runLogKey(status: RunStatus, date: Date): string {
  return `logs/${status}_${formatTimestamp(date)}.txt`;
}

/**
 * Store the raw bulletin. Failures propagate.
 */
export async function archiveDocument(
  store: ObjectStore,
  date: Date,
  filename: string,
  bytes: Uint8Array
): Promise<string> {
  const key = archiveKey(date, filename);
  await store.put(key, bytes, 'application/pdf');
  return key;
}

/**
 * Best effort: a failed write is logged and returned, never thrown
 */
export async function writeRunLog(
  store: ObjectStore,
  status: RunStatus,
  message: string,
  date: Date,
  logger: Logger = defaultLogger
): Promise<AdvisoryResult> {
  const key = runLogKey(status, date);

  try {
    await store.put(key, message, 'text/plain');
    return { ok: true };
  } catch (error) {
    const failure =
      error instanceof StoreError ? error : new StoreError(`Failed to write run log: ${errorMessage(error)}`, key, error);
    logger.error({ key, error: failure.message }, 'Failed to save run log');
    return { ok: false, error: failure };
  }
}
