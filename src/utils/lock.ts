import { writeFile, readFile, unlink, stat } from 'node:fs/promises';
import { logger } from './logger.js';
import { errnoCode } from './errors.js';
import { LOCK_STALE_MS, LOCK_POLL_INTERVAL_MS, LOCK_MAX_WAIT_MS } from '../constants.js';

interface LockData {
  pid: number;
  acquiredAt: string;
}

export interface LockOptions {
  staleMs?: number;
  pollIntervalMs?: number;
  maxWaitMs?: number;
}

/**
 * Acquire an exclusive lock file using the `wx` (exclusive create) flag.
 * An existing lock older than `staleMs` is removed and the create retried;
 * otherwise poll until `maxWaitMs` has passed.
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<void> {
  const staleMs = options.staleMs ?? LOCK_STALE_MS;
  const pollIntervalMs = options.pollIntervalMs ?? LOCK_POLL_INTERVAL_MS;
  const maxWaitMs = options.maxWaitMs ?? LOCK_MAX_WAIT_MS;

  const lockData: LockData = {
    pid: process.pid,
    acquiredAt: new Date().toISOString(),
  };

  const deadline = Date.now() + maxWaitMs;

  while (true) {
    try {
      await writeFile(lockPath, JSON.stringify(lockData), { flag: 'wx' });
      return;
    } catch (err: unknown) {
      if (errnoCode(err) !== 'EEXIST') throw err;

      if (await isStale(lockPath, staleMs)) {
        try {
          await unlink(lockPath);
          logger.debug(`Removed stale lock file ${lockPath}, retrying...`);
          continue;
        } catch (unlinkErr: unknown) {
          // Another process got there first.
          if (errnoCode(unlinkErr) !== 'ENOENT') throw unlinkErr;
          continue;
        }
      }

      if (Date.now() >= deadline) {
        throw new Error(
          `Could not acquire lock at ${lockPath} after ${maxWaitMs / 1000}s. ` +
          'Another sync of this file may be running. Remove the lock file manually if this is an error.',
        );
      }

      await sleep(pollIntervalMs);
    }
  }
}

export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (err: unknown) {
    if (errnoCode(err) !== 'ENOENT') throw err;
  }
}

/**
 * Execute `fn` while holding an exclusive lock.
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>, options?: LockOptions): Promise<T> {
  await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const content = await readFile(lockPath, 'utf-8');
    const data: unknown = JSON.parse(content);
    if (isLockData(data)) {
      return Date.now() - new Date(data.acquiredAt).getTime() > staleMs;
    }
  } catch {
    // unreadable or half-written: fall back to mtime below
  }
  try {
    const st = await stat(lockPath);
    return Date.now() - st.mtimeMs > staleMs;
  } catch {
    return true;
  }
}

function isLockData(value: unknown): value is LockData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'acquiredAt' in value &&
    typeof value.acquiredAt === 'string'
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
