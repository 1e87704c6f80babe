/**
 * Filesystem utilities shared across modules.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rm, stat } from 'node:fs/promises';

/** Create directory and all parents if they don't exist. */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/** Sibling path used while writing, renamed into place on success. */
export function tempSiblingPath(path: string): string {
  return `${path}.squash-tmp-${randomBytes(8).toString('hex')}`;
}

/** Remove a file if present. */
export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}

/** Size in bytes, or 0 when it cannot be determined. */
export async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}
