import { RECEIVE_TIMEOUT, type ReceiveResult } from '../types/transport.js';

interface Waiter {
  resolve: (result: ReceiveResult) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Queue between a transport's event-driven input and the pull-style
 * `receive(timeout)` the engine polls with.
 */
export class DatagramInbox {
  private queue: Buffer[] = [];
  private waiters: Waiter[] = [];
  private pendingErrors: Error[] = [];
  private failure?: Error;
  private _dropped = 0;

  constructor(private readonly maxQueued: number = 256) {}

  get queued(): number {
    return this.queue.length;
  }

  /**
   * Datagrams discarded because the queue was full
   */
  get dropped(): number {
    return this._dropped;
  }

  push(data: Buffer): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve({ kind: 'datagram', data });
      return;
    }

    this.queue.push(data);
    if (this.queue.length > this.maxQueued) {
      this.queue.shift();
      this._dropped++;
    }
  }

  /**
   * Fail the next receive (or every receive from now on when `persistent`)
   */
  fail(error: Error, persistent = false): void {
    if (persistent) {
      // Keep the root cause when a link reports several failures
      if (!this.failure) this.failure = error;
      const failure = this.failure;
      for (const waiter of this.waiters.splice(0)) {
        clearTimeout(waiter.timer);
        waiter.reject(failure);
      }
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    } else {
      this.pendingErrors.push(error);
    }
  }

  receive(timeoutMs: number): Promise<ReceiveResult> {
    const data = this.queue.shift();
    if (data) {
      return Promise.resolve({ kind: 'datagram', data });
    }

    const pending = this.pendingErrors.shift();
    if (pending) {
      return Promise.reject(pending);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<ReceiveResult>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(RECEIVE_TIMEOUT);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Release every pending receive as a timeout and drop queued datagrams
   */
  close(): void {
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(RECEIVE_TIMEOUT);
    }
    this.queue = [];
    this.pendingErrors = [];
  }

  reset(): void {
    this.close();
    this.failure = undefined;
  }
}
