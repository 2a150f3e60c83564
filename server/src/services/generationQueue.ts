/**
 * Generation queue.
 *
 * Admission control for the heavyweight part of a request (running the
 * generator and persisting its output): at most `concurrency` tasks run at
 * once, the rest wait in FIFO order. The service uses a single slot because
 * the executable cannot usefully run concurrent generations.
 *
 * A waiter whose signal is aborted before its turn is dropped without running.
 */

import { RequestCancelledError } from "../errors";

interface Waiter {
  grant: () => void;
}

export class GenerationQueue {
  private readonly concurrency: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(concurrency: number = 1) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Generation queue concurrency must be a positive integer (got ${concurrency})`);
    }
    this.concurrency = concurrency;
  }

  /** Tasks currently running. */
  get activeCount(): number {
    return this.active;
  }

  /** Tasks waiting for a slot. */
  get pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Run `task` once a slot is free.
   *
   * @throws RequestCancelledError if `signal` aborts before the task starts
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError());
    }

    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };

      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) {
          this.waiters.splice(idx, 1);
          reject(new RequestCancelledError());
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Hand the slot straight to the next waiter, or free it. */
  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant();
    } else {
      this.active--;
    }
  }
}
