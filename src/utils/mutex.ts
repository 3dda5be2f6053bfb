interface Waiter {
  resolve: (release: () => void) => void;
}

/**
 * Async mutual exclusion lock.
 *
 * - FIFO hand-off: waiters acquire in the order they asked.
 * - `runExclusive` releases on both fulfilment and rejection.
 */
export class Mutex {
  private locked = false;
  private queue: Waiter[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push({ resolve });
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.next();
    };
  }

  private next(): void {
    const waiter = this.queue.shift();
    if (waiter) {
      waiter.resolve(this.createRelease());
    } else {
      this.locked = false;
    }
  }
}
