// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Single-consumer queue that turns callback pushes into an async iterable.
 * Used to surface streamed model text from inside the agent generator.
 */
export class EventChannel<T> {
  private queue: T[] = [];
  private waiter: (() => void) | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    this.queue.push(value);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Yield queued values as they arrive until the channel is closed and empty.
   */
  async *drain(): AsyncGenerator<T, void, undefined> {
    while (true) {
      while (this.queue.length > 0) {
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
        }
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
