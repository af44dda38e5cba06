/**
 * @license
 * Copyright 2025 Google Inc.
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A simple asynchronous mutex implementation.
 */
export class Mutex {
  /**
   * A guard that releases the mutex when disposed.
   */
  static Guard = class Guard {
    #mutex: Mutex;
    constructor(mutex: Mutex) {
      this.#mutex = mutex;
    }
    /**
     * Releases the mutex.
     */
    dispose(): void {
      return this.#mutex.release();
    }
  };

  #locked = false;
  #acquirers: Array<() => void> = [];

  /**
   * Acquires the mutex, waiting if necessary. This is a FIFO queue.
   *
   * @returns A promise that resolves with a guard, which will release the
   * mutex when disposed.
   */
  async acquire(): Promise<InstanceType<typeof Mutex.Guard>> {
    if (!this.#locked) {
      this.#locked = true;
      return new Mutex.Guard(this);
    }
    await new Promise<void>(resolve => {
      this.#acquirers.push(resolve);
    });
    return new Mutex.Guard(this);
  }

  /**
   * Runs `fn` while holding the mutex.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const guard = await this.acquire();
    try {
      return await fn();
    } finally {
      guard.dispose();
    }
  }

  get locked(): boolean {
    return this.#locked;
  }

  /**
   * Releases the mutex.
   * @internal
   */
  release(): void {
    const resolve = this.#acquirers.shift();
    if (!resolve) {
      this.#locked = false;
      return;
    }
    resolve();
  }
}
