// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Dispatch Lane - the single execution slot in front of the debugger.
 *
 * The debugger's command interpreter is not reentrant: two commands in
 * flight at once corrupt its output and selection state. Every command goes
 * through one lane, and callers that arrive while it is busy wait their turn
 * in FIFO order.
 */

/**
 * Single-permit FIFO mutex for async operations.
 */
export class DispatchLane {
  private busy = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquire the lane, waiting if necessary.
   */
  async acquire(): Promise<void> {
    if (!this.busy) {
      this.busy = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Release the lane, handing it straight to the next waiter if any.
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // Lane stays busy; ownership passes to the waiter
      next();
    } else {
      this.busy = false;
    }
  }

  /**
   * Run a function while holding the lane.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isBusy(): boolean {
    return this.busy;
  }

  getStats(): { busy: boolean; waiting: number } {
    return {
      busy: this.busy,
      waiting: this.waitQueue.length,
    };
  }
}
