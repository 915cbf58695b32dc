/**
 * Storage Module
 */

export { MemoryObjectStore, type ObjectStore, type StoredObject } from './object-store.js';
export { S3ObjectStore, type S3ObjectStoreOptions } from './s3-store.js';
export { PostgresObjectStore } from './postgres-store.js';
export { DedupStore, fingerprint, markerKey } from './dedup-store.js';
export { archiveDocument, archiveKey, runLogKey, writeRunLog } from './archive.js';
