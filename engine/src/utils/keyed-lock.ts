/**
 * Cellar Engine — Keyed Lock
 *
 * Exclusive FIFO lock per key. Used for the per-bottle install lease and
 * for serializing shortcut writes.
 */

import { CancellationError } from "../errors";

export type Release = () => void;

interface Waiter {
  grant: () => void;
}

export class KeyedLock {
  /** Queue per held key; the head holds the lock */
  private readonly queues = new Map<string, Waiter[]>();

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  /** Requests waiting behind the current holder */
  waiting(key: string): number {
    const queue = this.queues.get(key);
    return queue ? queue.length - 1 : 0;
  }

  /**
   * Wait for exclusive ownership of key.
   *
   * @throws CancellationError if signal aborts before the lock is granted
   */
  acquire(key: string, signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new CancellationError("lease", `Cancelled while waiting for "${key}"`));
    }

    return new Promise<Release>((resolve, reject) => {
      let released = false;
      const release: Release = () => {
        if (released) return;
        released = true;
        this.releaseHead(key, waiter);
      };

      const onAbort = () => {
        const queue = this.queues.get(key);
        if (!queue) return;
        const index = queue.indexOf(waiter);
        // The holder is never removed by an abort
        if (index <= 0) return;
        queue.splice(index, 1);
        reject(new CancellationError("lease", `Cancelled while waiting for "${key}"`));
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(release);
        },
      };

      const queue = this.queues.get(key);
      if (!queue) {
        this.queues.set(key, [waiter]);
        waiter.grant();
        return;
      }
      queue.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Run fn while holding key.
   */
  async withLock<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaseHead(key: string, waiter: Waiter): void {
    const queue = this.queues.get(key);
    if (!queue || queue[0] !== waiter) return;
    queue.shift();
    const next = queue[0];
    if (next) {
      next.grant();
    } else {
      this.queues.delete(key);
    }
  }
}
