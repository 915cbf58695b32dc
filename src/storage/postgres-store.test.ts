import { describe, expect, it } from 'vitest';
import { PostgresObjectStore } from './postgres-store.js';
import type { SqlClient } from '../db/index.js';
import { StoreError } from '../utils/errors.js';

interface RecordedQuery {
  text: string;
  params?: unknown[];
}

function recordingClient(rows: unknown[] = []): { sql: SqlClient; queries: RecordedQuery[] } {
  const queries: RecordedQuery[] = [];
  const sql: SqlClient = {
    query: async (text, params) => {
      queries.push({ text, params });
      return { rows };
    },
  };
  return { sql, queries };
}

describe('PostgresObjectStore', () => {
  it('reports an existing key', async () => {
    const { sql, queries } = recordingClient([{ '?column?': 1 }]);
    const store = new PostgresObjectStore(sql);

    await expect(store.exists('processed/abc.txt')).resolves.toBe(true);
    expect(queries[0]?.params).toEqual(['processed/abc.txt']);
  });

  it('reports a missing key', async () => {
    const { sql } = recordingClient([]);

    await expect(new PostgresObjectStore(sql).exists('processed/abc.txt')).resolves.toBe(false);
  });

  it('upserts bodies as bytes', async () => {
    const { sql, queries } = recordingClient();
    const store = new PostgresObjectStore(sql);

    await store.put('processed/abc.txt', 'marker', 'text/plain');

    expect(queries[0]?.text).toContain('ON CONFLICT (key) DO UPDATE');
    expect(queries[0]?.params).toEqual(['processed/abc.txt', Buffer.from('marker'), 'text/plain']);
  });

  it('wraps query failures in StoreError', async () => {
    const sql: SqlClient = {
      query: async () => {
        throw new Error('connection terminated');
      },
    };
    const store = new PostgresObjectStore(sql);

    await expect(store.exists('processed/abc.txt')).rejects.toBeInstanceOf(StoreError);
    await expect(store.put('processed/abc.txt', 'x', 'text/plain')).rejects.toThrow(
      'Write of processed/abc.txt failed: connection terminated'
    );
  });
});
