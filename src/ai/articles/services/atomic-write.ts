/**
 * Atomic file writes.
 *
 * Readers never observe a partially written file: content goes to a temp
 * file in the target directory and is then renamed (replace) or hard-linked
 * (create-only) into place.
 */

import { randomUUID } from 'node:crypto';
import { link, mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID().slice(0, 8)}.tmp`);
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!isNodeError(error, 'ENOENT')) throw error;
  }
}

export function isNodeError(error: unknown, code: string): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === code;
}

/**
 * Writes `data` to `filePath`, replacing any existing file in one rename.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await removeQuietly(tempPath);
    throw error;
  }
}

/**
 * Writes `data` to `filePath` only if nothing exists there yet.
 *
 * @returns false when the file already exists (nothing is written)
 */
export async function writeFileExclusive(filePath: string, data: string | Uint8Array): Promise<boolean> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);
  try {
    await writeFile(tempPath, data);
    await link(tempPath, filePath);
    return true;
  } catch (error) {
    if (isNodeError(error, 'EEXIST')) return false;
    throw error;
  } finally {
    await removeQuietly(tempPath);
  }
}

/**
 * Creates `<stem><ext>`, or `<stem>-2<ext>`, `<stem>-3<ext>` ... when taken.
 *
 * @returns the path actually written
 */
export async function writeFileWithUniqueName(
  directory: string,
  stem: string,
  extension: string,
  data: string | Uint8Array,
  maxAttempts = 100
): Promise<string> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const suffix = attempt === 1 ? '' : `-${attempt}`;
    const filePath = join(directory, `${stem}${suffix}${extension}`);
    if (await writeFileExclusive(filePath, data)) {
      return filePath;
    }
  }
  throw new Error(`Could not find a free file name for ${stem}${extension} in ${directory}`);
}
