/**
 * File helpers for schedule text, templates, config and exports
 *
 * Reads are UTF-8 with a leading byte-order mark removed; text dumped by
 * Windows OCR tools and editors often starts with one. Writes go through a
 * temp file beside the target and a rename.
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';

const BOM = '\uFEFF';

export function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

export function fsErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Short reason for a failed read, suitable for a one-line CLI error
 */
export function describeReadError(error: unknown): string {
  switch (fsErrorCode(error)) {
    case 'ENOENT':
      return 'file not found';
    case 'EISDIR':
      return 'is a directory';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    default:
      return error instanceof Error ? error.message : String(error);
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  return stripBom(await fs.readFile(filePath, 'utf-8'));
}

/**
 * Like readTextFile, but a missing file reads as null
 */
export async function readOptionalTextFile(filePath: string): Promise<string | null> {
  try {
    return await readTextFile(filePath);
  } catch (error) {
    if (fsErrorCode(error) === 'ENOENT') return null;
    throw error;
  }
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (fsErrorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Write `content` so that readers see either the old file or the new one.
 * Parent directories are created as needed.
 */
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}
