/**
 * Exclusive advisory lock on a sibling `.lock` file.
 *
 * The lock file is created with O_EXCL and holds the owner's PID. A lock
 * whose owner process no longer exists is broken, and so is one left empty
 * for longer than EMPTY_LOCK_GRACE_MS. Waiting is synchronous,
 * matching the synchronous storage API; without `timeoutMs` it never gives up.
 */

import {
  type Stats, closeSync, linkSync, openSync, readFileSync, renameSync, statSync, unlinkSync, writeSync,
} from 'node:fs';
import { LockContentionError } from '../errors.js';

const DEFAULT_POLL_INTERVAL_MS = 25;
/** How long an empty lock file is left alone before it counts as abandoned */
export const EMPTY_LOCK_GRACE_MS = 1000;

export interface FileLockOptions {
  /** Give up with LockContentionError after this many ms. Unbounded when omitted. */
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === 'EPERM';
  }
}

export class FileLock {
  readonly lockPath: string;
  private readonly timeoutMs: number | undefined;
  private readonly pollIntervalMs: number;
  private held = false;

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this.lockPath = lockPath;
    this.timeoutMs = options.timeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /** Block until the lock is ours */
  acquire(): void {
    const started = Date.now();
    for (;;) {
      if (this.tryAcquire()) {
        this.held = true;
        return;
      }
      if (this.breakIfStale()) continue;

      const waited = Date.now() - started;
      if (this.timeoutMs !== undefined && waited >= this.timeoutMs) {
        throw new LockContentionError(this.lockPath, waited);
      }
      sleepSync(this.pollIntervalMs);
    }
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    try {
      unlinkSync(this.lockPath);
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
    }
  }

  /** Run `fn` while holding the lock */
  withLock<T>(fn: () => T): T {
    this.acquire();
    try {
      return fn();
    } finally {
      this.release();
    }
  }

  private tryAcquire(): boolean {
    let fd: number;
    try {
      fd = openSync(this.lockPath, 'wx');
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'EEXIST') return false;
      throw err;
    }
    try {
      writeSync(fd, String(process.pid));
    } finally {
      closeSync(fd);
    }
    return true;
  }

  /**
   * Remove the lock file when its owner is gone. Returns true if the caller
   * should retry at once.
   *
   * The file is renamed aside before it is removed, and its content checked
   * again, so a waiter never deletes a lock another waiter took meanwhile.
   */
  private breakIfStale(): boolean {
    let content: string;
    let seen: Stats;
    try {
      content = readFileSync(this.lockPath, 'utf8').trim();
      seen = statSync(this.lockPath);
    } catch (err: unknown) {
      // Released between our attempt and this read
      if (isErrnoException(err) && err.code === 'ENOENT') return true;
      throw err;
    }

    if (content === '') {
      // The owner may still be writing its PID
      if (Date.now() - seen.mtimeMs < EMPTY_LOCK_GRACE_MS) return false;
    } else if (!/^\d+$/.test(content) || isProcessAlive(Number(content))) {
      return false;
    }

    const aside = `${this.lockPath}.${process.pid}.stale`;
    try {
      renameSync(this.lockPath, aside);
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') return true;
      throw err;
    }

    // A fresh lock can carry the same content (an empty file), so compare inodes too
    if (statSync(aside).ino !== seen.ino || readFileSync(aside, 'utf8').trim() !== content) {
      // Someone else broke the lock and took it first; put theirs back
      this.restore(aside);
      return false;
    }
    unlinkSync(aside);
    return true;
  }

  private restore(aside: string): void {
    try {
      linkSync(aside, this.lockPath);
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
    } finally {
      unlinkSync(aside);
    }
  }
}
