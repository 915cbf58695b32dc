/**
 * Object store abstraction
 *
 * Keys are slash-separated paths such as "processed/<md5>.txt".
 */

export interface ObjectStore {
  /**
   * Resolve true if an object exists at key, false if it does not.
   * Any other backend failure rejects with StoreError.
   */
  exists(key: string): Promise<boolean>;

  /**
   * Create or replace the object at key. Rejects with StoreError.
   */
  put(key: string, body: Uint8Array | string, contentType: string): Promise<void>;
}

export interface StoredObject {
  body: Buffer;
  contentType: string;
}

/**
 * In-process store for tests and local dry runs
 */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async put(key: string, body: Uint8Array | string, contentType: string): Promise<void> {
    const bytes = typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
    this.objects.set(key, { body: bytes, contentType });
  }

  keys(prefix = ''): string[] {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  text(key: string): string | undefined {
    return this.objects.get(key)?.body.toString('utf-8');
  }
}
