import * as fsp from 'fs/promises';
import path from 'path';

import { v4 as uuidv4 } from 'uuid';

/**
 * Writes `data` to a sibling temp file, flushes it, then renames it over `filePath`.
 * Readers see either the old file or the complete new one.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  const tempPath = await writeTempFile(filePath, data);
  try {
    await fsp.rename(tempPath, filePath);
  } catch (error) {
    await fsp.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * First half of an atomic write: returns the path of a fully flushed temp file
 * next to `filePath`. The caller renames it into place or removes it.
 */
export async function writeTempFile(filePath: string, data: string): Promise<string> {
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${uuidv4()}.tmp`,
  );
  const handle = await fsp.open(tempPath, 'w');
  try {
    await handle.writeFile(data, 'utf-8');
    await handle.sync();
  } catch (error) {
    await handle.close();
    await fsp.rm(tempPath, { force: true });
    throw error;
  }
  await handle.close();
  return tempPath;
}

/**
 * In-process mutual exclusion. Callers run one at a time in arrival order.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  public run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/** Formats a date as YYYYMMDD_HHmmss_SSS in UTC, for file names that sort by time. */
export function formatFileTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

/** fs errors may come from another realm, so this checks shape, not prototype. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
