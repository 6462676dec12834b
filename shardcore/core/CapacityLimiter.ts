//shardcore/core/CapacityLimiter.ts

import { CancelledError } from "./errors";

export type Release = () => void;

interface Waiter {
  grant: () => void;
}

/**
 * Counting semaphore bounding how many units may run at once.
 *
 * Waiters are served in arrival order. A released slot is handed straight to
 * the oldest waiter, so `borrowed` never dips while someone is queued.
 */
export class CapacityLimiter {
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly total: number) {
    if (!Number.isInteger(total) || total < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${total}`);
    }
  }

  get borrowed(): number {
    return this.inUse;
  }

  get available(): number {
    return this.total - this.inUse;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  tryAcquire(): Release | null {
    if (this.inUse >= this.total || this.waiters.length > 0) return null;
    this.inUse++;
    return this.makeRelease();
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(new CancelledError(signal.reason));

    const immediate = this.tryAcquire();
    if (immediate) return Promise.resolve(immediate);

    return new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(waiter);
        if (idx === -1) return;
        this.waiters.splice(idx, 1);
        reject(new CancelledError(signal?.reason));
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(this.makeRelease());
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private makeRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.inUse--;
      }
    };
  }
}
