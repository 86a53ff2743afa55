import * as fs from 'fs-extra';
import { differenceInMilliseconds } from 'date-fns';

import { STATE_CACHE } from '../../constants';
import { silentLogger } from '../logging/logger';
import type { Log } from '../logging/types';
import { errorCode } from '../utils/retry';

/** Content of the lock file */
export interface LockInfo {
  pid: number;
  acquired_at: string;
}

export type LockAttempt =
  | { acquired: true; info: LockInfo; release: () => Promise<void> }
  | { acquired: false; reason: 'busy'; holder: LockInfo | null }
  | { acquired: false; reason: 'error'; error: unknown };

export interface ReloadLockOptions {
  staleMs?: number;
  pid?: number;
  now?: () => Date;
  logger?: Log;
}

function parseLockInfo(text: string): LockInfo | null {
  try {
    const value: unknown = JSON.parse(text);
    if (typeof value !== 'object' || value === null) return null;
    const pid = 'pid' in value ? value.pid : undefined;
    const acquiredAt = 'acquired_at' in value ? value.acquired_at : undefined;
    if (typeof pid !== 'number' || typeof acquiredAt !== 'string') return null;
    return { pid, acquired_at: acquiredAt };
  } catch {
    return null;
  }
}

/**
 * Exclusive, non-blocking lock backed by a file created with O_CREAT|O_EXCL.
 * A lock file older than the stale threshold is taken to belong to a crashed holder and reclaimed.
 */
export class ReloadLock {
  private readonly staleMs: number;
  private readonly pid: number;
  private readonly now: () => Date;
  private readonly logger: Log;

  constructor(private readonly lockPath: string, options: ReloadLockOptions = {}) {
    this.staleMs = options.staleMs ?? STATE_CACHE.LOCK_STALE_MS;
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  getPath(): string {
    return this.lockPath;
  }

  async tryAcquire(): Promise<LockAttempt> {
    try {
      const info = await this.create();
      return { acquired: true, info, release: () => this.release(info) };
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        return { acquired: false, reason: 'error', error };
      }
    }

    try {
      const stats = await fs.stat(this.lockPath);
      if (differenceInMilliseconds(this.now(), stats.mtime) <= this.staleMs) {
        return { acquired: false, reason: 'busy', holder: await this.readHolder() };
      }
      return await this.reclaimStale(stats);
    } catch (error) {
      // Another process won the reclaim, or the holder released in between
      if (errorCode(error) === 'EEXIST' || errorCode(error) === 'ENOENT') {
        return { acquired: false, reason: 'busy', holder: await this.readHolder() };
      }
      return { acquired: false, reason: 'error', error };
    }
  }

  /**
   * Replace the stale lock file observed as `observed`. Reclaimers take turns through an
   * exclusive guard file, and the lock is only removed while it is still that same stale file.
   */
  private async reclaimStale(observed: fs.Stats): Promise<LockAttempt> {
    if (!(await this.acquireGuard())) {
      return { acquired: false, reason: 'busy', holder: await this.readHolder() };
    }
    try {
      const current = await fs.stat(this.lockPath);
      if (current.ino !== observed.ino || current.mtimeMs !== observed.mtimeMs) {
        return { acquired: false, reason: 'busy', holder: await this.readHolder() };
      }
      const holder = await this.readHolder();
      const ageMs = differenceInMilliseconds(this.now(), current.mtime);
      this.logger.log(
        `Reclaiming stale reload lock held by pid ${holder?.pid ?? 'unknown'} (${Math.round(ageMs / 1000)}s old)`,
        'warning'
      );
      await fs.remove(this.lockPath);
      const info = await this.create();
      return { acquired: true, info, release: () => this.release(info) };
    } finally {
      await fs.remove(this.guardPath()).catch((error: unknown) => {
        this.logger.log(`Unable to remove ${this.guardPath()}: ${String(error)}`, 'error');
      });
    }
  }

  private guardPath(): string {
    return `${this.lockPath}.reclaim`;
  }

  /** A guard left behind by a crashed reclaimer is cleared once it is stale; the caller retries next cycle. */
  private async acquireGuard(): Promise<boolean> {
    try {
      await fs.close(await fs.open(this.guardPath(), 'wx'));
      return true;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') throw error;
    }
    const stats = await fs.stat(this.guardPath()).catch((error: unknown) => {
      if (errorCode(error) === 'ENOENT') return null;
      throw error;
    });
    if (stats && differenceInMilliseconds(this.now(), stats.mtime) > this.staleMs) {
      await fs.remove(this.guardPath());
    }
    return false;
  }

  async readHolder(): Promise<LockInfo | null> {
    try {
      return parseLockInfo(await fs.readFile(this.lockPath, 'utf8'));
    } catch {
      return null;
    }
  }

  private async create(): Promise<LockInfo> {
    const info: LockInfo = { pid: this.pid, acquired_at: this.now().toISOString() };
    const fd = await fs.open(this.lockPath, 'wx');
    try {
      await fs.writeFile(fd, JSON.stringify(info), 'utf8');
      await fs.close(fd);
    } catch (error) {
      await fs.close(fd).catch(() => undefined);
      await fs.remove(this.lockPath);
      throw error;
    }
    return info;
  }

  private async release(info: LockInfo): Promise<void> {
    // Only remove the file if it is still ours; a reclaimer may have replaced it
    const holder = await this.readHolder();
    if (holder && (holder.pid !== info.pid || holder.acquired_at !== info.acquired_at)) {
      this.logger.log(`Reload lock was taken over by pid ${holder.pid}; leaving it in place`, 'warning');
      return;
    }
    try {
      await fs.remove(this.lockPath);
    } catch (error) {
      this.logger.log(`Unable to remove reload lock ${this.lockPath}: ${String(error)}`, 'error');
    }
  }
}
