/**
 * File helpers for output artifacts
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp used in artifact names, e.g. 20240624_153012
 */
export function fileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/**
 * Write through a temp file and rename it over the target, so readers see
 * either the old content or the new, never a partial file.
 */
export async function writeFileAtomic(path: string, data: string): Promise<void> {
  await ensureDir(dirname(path));
  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Write `<base><ext>` in `dir` without ever replacing an existing file;
 * on a name clash a numeric suffix is appended (`<base>_1<ext>`, ...).
 * @returns the path written
 */
export async function writeNewFile(dir: string, base: string, ext: string, data: string): Promise<string> {
  await ensureDir(dir);

  for (let attempt = 0; ; attempt++) {
    const path = join(dir, attempt === 0 ? `${base}${ext}` : `${base}_${attempt}${ext}`);
    try {
      await writeFile(path, data, { encoding: 'utf-8', flag: 'wx' });
      return path;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
}
