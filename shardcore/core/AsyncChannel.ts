//shardcore/core/AsyncChannel.ts

import { CancelledError, ChannelClosedError } from "./errors";

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (err: unknown) => void;
}

interface PendingReceive<T> {
  resolve: (item: T) => void;
  reject: (err: unknown) => void;
}

type Taken<T> = { ok: true; item: T } | { ok: false };

/**
 * Bounded FIFO channel between async producers and consumers.
 *
 * capacity 0 is a rendezvous: `send` resolves only once a receiver has taken
 * the item. `Infinity` never blocks a sender.
 *
 * Invariants:
 *  - receivers wait only while the buffer is empty and no sender waits
 *  - senders wait only while the buffer is full and no receiver waits
 *  - an aborted receive never consumes an item
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity = 0) {
    if (Number.isNaN(capacity) || capacity < 0) {
      throw new RangeError(`channel capacity must be >= 0, got ${capacity}`);
    }
  }

  /** Items buffered and not yet received. Blocked senders are not counted. */
  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of senders currently blocked on a full channel. */
  get blockedSenders(): number {
    return this.senders.length;
  }

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  /** Non-blocking send. Returns false when the item would have to wait. */
  trySend(item: T): boolean {
    if (this.isClosed) throw new ChannelClosedError();

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(item);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return true;
    }

    return false;
  }

  send(item: T, signal?: AbortSignal): Promise<void> {
    if (this.isClosed) return Promise.reject(new ChannelClosedError());
    if (signal?.aborted) return Promise.reject(new CancelledError(signal.reason));
    if (this.trySend(item)) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.senders.indexOf(pending);
        if (idx === -1) return;
        this.senders.splice(idx, 1);
        reject(new CancelledError(signal?.reason));
      };

      const pending: PendingSend<T> = {
        item,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };

      this.senders.push(pending);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  // ---------------------------------------------------------------------------
  // Receiving
  // ---------------------------------------------------------------------------

  receive(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) return Promise.reject(new CancelledError(signal.reason));

    const taken = this.take();
    if (taken.ok) return Promise.resolve(taken.item);
    if (this.isClosed) return Promise.reject(new ChannelClosedError());

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.receivers.indexOf(pending);
        if (idx === -1) return;
        this.receivers.splice(idx, 1);
        reject(new CancelledError(signal?.reason));
      };

      const pending: PendingReceive<T> = {
        resolve: (item) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(item);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };

      this.receivers.push(pending);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private take(): Taken<T> {
    if (this.buffer.length > 0) {
      const item = this.buffer[0];
      this.buffer.splice(0, 1);

      // A slot opened up: the oldest blocked sender moves into the buffer.
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.item);
        sender.resolve();
      }
      return { ok: true, item };
    }

    // Rendezvous hand-off straight from a blocked sender.
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return { ok: true, item: sender.item };
    }

    return { ok: false };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Close the channel. Buffered items can still be received; blocked senders
   * and waiting receivers are rejected with ChannelClosedError.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(new ChannelClosedError());
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  /** Iterate until the channel closes; rejects with CancelledError on abort. */
  async *iterate(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    while (true) {
      let item: T;
      try {
        item = await this.receive(signal);
      } catch (err) {
        if (err instanceof ChannelClosedError) return;
        throw err;
      }
      yield item;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterate();
  }
}
