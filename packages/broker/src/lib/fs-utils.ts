/**
 * Filesystem helpers shared by the file-backed broker components.
 *
 * @module broker/lib/fs-utils
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { monotonicFactory } from 'ulidx';

/** File permission: rw for owner only. */
const FILE_MODE = 0o600;

/** File extension for message JSON files. */
export const FILE_EXT = '.json';

const generateUlid = monotonicFactory();

/**
 * Write a file atomically: write to a sibling temp file, then rename over the target.
 *
 * Readers never observe a partial file. An existing target is replaced, so
 * concurrent writers of the same path resolve to last-write-wins.
 *
 * @param filePath - Absolute path to write.
 * @param data - String content to write.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${generateUlid()}.tmp`);
  try {
    await fs.writeFile(tmpPath, data, { encoding: 'utf-8', mode: FILE_MODE });
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await silentUnlink(tmpPath);
    throw err;
  }
}

/** One message file with its modification time. */
export interface MessageFileEntry {
  filePath: string;
  mtimeMs: number;
}

/**
 * List `*.json` files in a directory with their modification times.
 *
 * Temp files and entries that vanish between `readdir` and `stat` are
 * skipped; a missing directory yields an empty list.
 *
 * @param dirPath - Directory to scan.
 */
export async function listMessageFiles(dirPath: string): Promise<MessageFileEntry[]> {
  let names: string[];
  try {
    names = await fs.readdir(dirPath);
  } catch (err) {
    if (isEnoent(err)) return [];
    throw err;
  }

  const entries: MessageFileEntry[] = [];
  for (const name of names) {
    if (!name.endsWith(FILE_EXT) || name.startsWith('.')) continue;
    const filePath = path.join(dirPath, name);
    try {
      const stat = await fs.stat(filePath);
      entries.push({ filePath, mtimeMs: stat.mtimeMs });
    } catch (err) {
      if (!isEnoent(err)) throw err;
    }
  }
  return entries;
}

/**
 * Unlink a file, silently ignoring ENOENT errors.
 *
 * @param filePath - Absolute path to unlink.
 */
export async function silentUnlink(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch {
    // Ignore — file may not exist
  }
}

/**
 * Check if an error is an ENOENT (file/directory not found) error.
 *
 * @param err - The error to check.
 */
export function isEnoent(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
