/**
 * Scoped temporary files
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface TempFileOptions {
  /** Directory the scratch directory is created in (default: OS temp dir) */
  root?: string;
  /** File name inside the scratch directory */
  name?: string;
}

/**
 * Write bytes to a fresh temp file, run fn with its path, then remove it.
 *
 * The file and its directory are removed on every exit path, including a
 * rejected fn.
 */
export async function withTempFile<T>(
  bytes: Uint8Array,
  fn: (path: string) => Promise<T>,
  options: TempFileOptions = {}
): Promise<T> {
  const dir = await mkdtemp(join(options.root ?? tmpdir(), 'sat-monitor-'));
  try {
    const path = join(dir, options.name ?? 'document.pdf');
    await writeFile(path, bytes);
    return await fn(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
