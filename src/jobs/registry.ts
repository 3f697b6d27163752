import { getLogger } from '../logger.js';
import { AsyncMutex } from './asyncMutex.js';
import type { JobHandle } from './jobHandle.js';

/**
 * Live jobs keyed by id. Every mutation runs under a lock owned by that id, so
 * starts and removals for one job are serialized while unrelated jobs never
 * wait on each other. Locks are only held for the map update itself.
 */
export class JobRegistry {
  private readonly entries = new Map<string, JobHandle>();
  private readonly locks = new Map<string, AsyncMutex>();

  /** Inserts the handle unless the id is taken; the existing entry is left alone. */
  async register(jobId: string, handle: JobHandle): Promise<boolean> {
    return this.withLock(jobId, () => {
      if (this.entries.has(jobId)) {
        getLogger().debug({ jobId }, 'Rejected duplicate job registration');
        return false;
      }

      this.entries.set(jobId, handle);
      return true;
    });
  }

  /**
   * Removes the entry when present. Passing the handle restricts removal to
   * that exact entry. Safe to call from several terminal paths.
   */
  async unregister(jobId: string, handle?: JobHandle): Promise<void> {
    await this.withLock(jobId, () => {
      const current = this.entries.get(jobId);
      if (!current || (handle && current !== handle)) {
        return;
      }

      this.entries.delete(jobId);
    });
  }

  lookup(jobId: string): JobHandle | undefined {
    return this.entries.get(jobId);
  }

  activeJobIds(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /** Locks currently allocated; drops back once ids go idle. */
  get lockCount(): number {
    return this.locks.size;
  }

  private async withLock<T>(jobId: string, operation: () => T): Promise<T> {
    let mutex = this.locks.get(jobId);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.locks.set(jobId, mutex);
    }

    const lock = mutex;
    try {
      return await lock.runExclusive(operation);
    } finally {
      if (lock.isIdle && !this.entries.has(jobId) && this.locks.get(jobId) === lock) {
        this.locks.delete(jobId);
      }
    }
  }
}
