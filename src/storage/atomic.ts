/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { Dirent } from 'node:fs';

/**
 * Error raised when a JSON file exists but cannot be parsed.
 */
export class InvalidJsonError extends Error {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid JSON in file: ${filePath}`, options);
    this.name = 'InvalidJsonError';
  }
}

/**
 * Write data to a JSON file atomically.
 *
 * The payload lands in a uniquely named temp file beside the target and is
 * renamed over it, so readers never observe a half-written document.
 *
 * @example
 * await atomicWriteJson('/path/to/file.json', { processed: [] });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${randomUUID()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Read and parse a JSON file
 *
 * @returns Parsed JSON data (unvalidated)
 * @throws Error if file doesn't exist, InvalidJsonError if JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new InvalidJsonError(filePath, { cause: error });
  }
}

/**
 * Check if a file exists (not a directory)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * List file names in a directory matching a predicate, sorted by name.
 *
 * @returns Absolute paths; empty when the directory doesn't exist
 */
export async function listFiles(
  dirPath: string,
  predicate: (fileName: string) => boolean
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && predicate(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dirPath, name));
}

/**
 * Move a file, falling back to copy + unlink across devices.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
    await fs.copyFile(source, destination);
    await fs.unlink(source);
  }
}
