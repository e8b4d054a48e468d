/**
 * Keyed Mutex
 *
 * In-process mutual exclusion per key: holders of the same key run one at a
 * time in arrival order, different keys never wait on each other. A waiter
 * whose signal aborts leaves the queue at once and the next waiter keeps its
 * place behind the current holder. Idle keys are dropped.
 *
 * @module shared/utils/KeyedMutex
 */

import { createAbortError, throwIfAborted } from './retry';

export type Release = () => void;

interface KeyQueue {
  /** Settles when the last queued holder of the key releases. */
  tail: Promise<void>;
  /** Holders plus waiters. */
  pending: number;
}

async function waitTurn(previous: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    await previous;
    return;
  }

  let onAbort: () => void = () => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(createAbortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    await Promise.race([previous, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

export class KeyedMutex {
  private readonly queues = new Map<string, KeyQueue>();

  /**
   * Wait for the key and return its release function. Releasing twice is a no-op.
   * Rejects with an abort error when `signal` fires first.
   */
  async acquire(key: string, signal?: AbortSignal): Promise<Release> {
    throwIfAborted(signal);

    const queue = this.queues.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    const previous = queue.tail;

    let open: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      open = resolve;
    });
    queue.tail = previous.then(() => current);
    queue.pending += 1;
    this.queues.set(key, queue);

    let released = false;
    const release: Release = () => {
      if (released) {
        return;
      }
      released = true;
      open();
      queue.pending -= 1;
      if (queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    };

    try {
      await waitTurn(previous, signal);
    } catch (error) {
      release();
      throw error;
    }

    return release;
  }

  /**
   * Run `fn` while holding `key`.
   */
  async withLock<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  get size(): number {
    return this.queues.size;
  }
}
