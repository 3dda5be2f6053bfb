import { Mutex } from '../utils/mutex.js';
import type { Request, Response } from './message.js';

/**
 * Bookkeeping for one outbound request through to its response.
 *
 * `acknowledged`/`rejected` on the request, `response` and the retransmission
 * handle are only changed while holding `lock`.
 */
export class Transaction {
  request: Request;
  response?: Response;
  readonly lock = new Mutex();
  readonly createdAt: number;

  /** Settles once the retransmission task has fully exited */
  retransmission?: Promise<void>;
  /** Cancellation channel of the running retransmission task */
  retransmitStop?: AbortController;

  retransmissions = 0;

  /** Set by the block collaborator when another round is needed */
  blockTransfer = false;
  /** Set by the observe collaborator for subscription notifications */
  notification = false;
  completed = false;

  constructor(request: Request, now: number = Date.now()) {
    this.request = request;
    this.createdAt = now;
  }

  get mid(): number | undefined {
    return this.request.mid;
  }

  get tokenKey(): string {
    return this.request.tokenHex;
  }

  get isResolved(): boolean {
    return this.request.acknowledged || this.request.rejected;
  }

  get isRetransmitting(): boolean {
    return this.retransmission !== undefined;
  }

  /**
   * Mark resolution and fire the stop signal under the lock,
   * then wait for the retransmission task to exit.
   */
  async resolve(outcome: 'acknowledged' | 'rejected', response?: Response): Promise<void> {
    // Wrapped so runExclusive does not await the task under the lock
    const { task } = await this.lock.runExclusive(() => {
      if (outcome === 'acknowledged') {
        this.request.acknowledged = true;
      } else {
        this.request.rejected = true;
      }
      if (response) {
        this.response = response;
      }
      this.retransmitStop?.abort();
      return { task: this.retransmission };
    });

    if (task) {
      await task;
    }
  }
}
