/**
 * PostgreSQL-backed object store
 *
 * Objects live in the stored_objects table created by db/schema.ts.
 */

import { StoreError, errorMessage } from '../utils/errors.js';
import type { SqlClient } from '../db/index.js';
import type { ObjectStore } from './object-store.js';

export class PostgresObjectStore implements ObjectStore {
  constructor(private readonly sql: SqlClient) {}

  async exists(key: string): Promise<boolean> {
    try {
      const result = await this.sql.query('SELECT 1 FROM stored_objects WHERE key = $1', [key]);
      return result.rows.length > 0;
    } catch (error) {
      throw new StoreError(`Lookup of ${key} failed: ${errorMessage(error)}`, key, error);
    }
  }

  async put(key: string, body: Uint8Array | string, contentType: string): Promise<void> {
    const bytes = typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
    try {
      await this.sql.query(
        `INSERT INTO stored_objects (key, body, content_type)
         VALUES ($1, $2, $3)
         ON CONFLICT (key) DO UPDATE
           SET body = EXCLUDED.body,
               content_type = EXCLUDED.content_type,
               created_at = now()`,
        [key, bytes, contentType]
      );
    } catch (error) {
      throw new StoreError(`Write of ${key} failed: ${errorMessage(error)}`, key, error);
    }
  }
}
