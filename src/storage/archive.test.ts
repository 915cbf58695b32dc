import { describe, expect, it } from 'vitest';
import { archiveDocument, archiveKey, runLogKey, writeRunLog } from './archive.js';
import { MemoryObjectStore, type ObjectStore } from './object-store.js';
import { StoreError } from '../utils/errors.js';

const RUN_AT = new Date(2026, 9, 19, 8, 5, 3);

describe('archive keys', () => {
  it('groups bulletins by local date', () => {
    expect(archiveKey(RUN_AT, 'boletin_12.pdf')).toBe('boletines/20261019/boletin_12.pdf');
  });

  it('names run logs by status and local time', () => {
    expect(runLogKey('success', RUN_AT)).toBe('logs/success_20261019_080503.txt');
    expect(runLogKey('error', RUN_AT)).toBe('logs/error_20261019_080503.txt');
  });
});

describe('archiveDocument', () => {
  it('stores the raw bytes as a PDF', async () => {
    const store = new MemoryObjectStore();

    const key = await archiveDocument(store, RUN_AT, 'x.pdf', Buffer.from('%PDF-1.4'));

    expect(key).toBe('boletines/20261019/x.pdf');
    expect(store.objects.get(key)).toEqual({ body: Buffer.from('%PDF-1.4'), contentType: 'application/pdf' });
  });
});

describe('writeRunLog', () => {
  it('stores the message as plain text', async () => {
    const store = new MemoryObjectStore();

    await expect(writeRunLog(store, 'success', 'all good', RUN_AT)).resolves.toEqual({ ok: true });
    expect(store.text('logs/success_20261019_080503.txt')).toBe('all good');
    expect(store.objects.get('logs/success_20261019_080503.txt')?.contentType).toBe('text/plain');
  });

  it('returns the failure instead of throwing', async () => {
    const store: ObjectStore = {
      exists: async () => false,
      put: async (key) => {
        throw new StoreError('bucket unavailable', key);
      },
    };

    const result = await writeRunLog(store, 'error', 'boom', RUN_AT);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.key).toBe('logs/error_20261019_080503.txt');
      expect(result.error.message).toBe('bucket unavailable');
    }
  });
});
