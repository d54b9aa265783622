/**
 * Persistence Utilities - Shared save/load functionality
 *
 * JSON-file persistence used by the file-backed task store and job queue.
 * Writes go through a temporary file and a rename so a crash mid-write
 * never leaves a truncated document behind.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { InternalError, getErrorCodeSafe } from '../core/errors.js';

/**
 * Save data to a JSON file, creating parent directories as needed
 *
 * @example
 * ```typescript
 * await saveToFile('./data/tasks.json', { tasks: [] });
 * ```
 */
export async function saveToFile(filePath: string, data: unknown): Promise<void> {
  const resolvedPath = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolvedPath), { recursive: true });

  const tempPath = `${resolvedPath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(data), 'utf-8');
  await fs.rename(tempPath, resolvedPath);
}

/**
 * Load data from a JSON file
 *
 * @returns The parsed data, or null if the file doesn't exist
 */
export async function loadFromFile(filePath: string): Promise<unknown> {
  const resolvedPath = path.resolve(filePath);

  try {
    const content = await fs.readFile(resolvedPath, 'utf-8');
    return JSON.parse(content);
  } catch (error: unknown) {
    // File doesn't exist - return null (not an error)
    if (getErrorCodeSafe(error) === 'ENOENT') {
      return null;
    }
    // Re-throw other errors (parse errors, permission errors, etc.)
    throw error;
  }
}

/**
 * Resolve a `file://` URL (relative paths allowed, e.g. `file://./data/x.json`)
 * to a filesystem path
 */
export function filePathFromUrl(url: string): string {
  const prefix = 'file://';
  if (!url.startsWith(prefix)) {
    throw new Error(`Not a file URL: ${url}`);
  }
  return path.resolve(decodeURIComponent(url.slice(prefix.length)));
}

/**
 * Serializes async operations so they run in call order
 */
export class WriteChain {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(operation: () => Promise<T>): Promise<T> {
    const next = this.tail.then(operation, operation);
    this.tail = next.catch(() => undefined);
    return next;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Cross-process locking
// ═══════════════════════════════════════════════════════════════════════════

export interface FileLockOptions {
  /** Pause between attempts to take a held lock */
  retryDelayMs?: number;
  /** A lock file older than this is assumed abandoned by a dead process */
  staleAfterMs?: number;
  /** Give up waiting after this long */
  timeoutMs?: number;
}

const DEFAULT_LOCK_OPTIONS: Required<FileLockOptions> = {
  retryDelayMs: 10,
  staleAfterMs: 10000,
  timeoutMs: 5000,
};

async function lockAge(lockPath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(lockPath);
    return Date.now() - stats.mtimeMs;
  } catch (error: unknown) {
    if (getErrorCodeSafe(error) === 'ENOENT') return null;
    throw error;
  }
}

async function acquireLock(lockPath: string, options: Required<FileLockOptions>): Promise<void> {
  const deadline = Date.now() + options.timeoutMs;
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (;;) {
    try {
      // 'wx' fails when the file exists, so only one process can create it
      const handle = await fs.open(lockPath, 'wx');
      await handle.writeFile(String(process.pid), 'utf-8');
      await handle.close();
      return;
    } catch (error: unknown) {
      if (getErrorCodeSafe(error) !== 'EEXIST') throw error;
    }

    const age = await lockAge(lockPath);
    if (age !== null && age > options.staleAfterMs) {
      await fs.rm(lockPath, { force: true });
      continue;
    }
    if (Date.now() >= deadline) {
      throw new InternalError(`Timed out after ${options.timeoutMs}ms waiting for lock ${lockPath}`);
    }
    await new Promise<void>((resolve) => setTimeout(resolve, options.retryDelayMs));
  }
}

/**
 * Run `operation` while holding `<filePath>.lock`. Every process that
 * read-modify-writes the same file must go through this.
 */
export async function withFileLock<T>(
  filePath: string,
  operation: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const lockPath = `${path.resolve(filePath)}.lock`;
  await acquireLock(lockPath, { ...DEFAULT_LOCK_OPTIONS, ...options });

  try {
    return await operation();
  } finally {
    await fs.rm(lockPath, { force: true });
  }
}
