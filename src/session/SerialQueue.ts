/**
 * shadow-alter - Serial Queue
 *
 * Runs tasks one at a time in arrival order. A waiter whose signal aborts
 * leaves the queue without disturbing the order of the others.
 */

import { raceAbort } from "./deadline.js";

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Tasks running or waiting */
  get size(): number {
    return this.pending;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => done);
    this.pending++;

    try {
      await (signal !== undefined ? raceAbort(previous, signal) : previous);
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
