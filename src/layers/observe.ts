import { OBSERVE_DEREGISTER, OBSERVE_REGISTER } from '../constants.js';
import type { Message, Request } from '../core/message.js';
import type { Transaction } from '../core/transaction.js';
import type { ObserveLayer } from '../types/index.js';

/**
 * Default observe collaborator.
 *
 * Tracks which tokens carry an active registration so the engine keeps those
 * transactions alive and routes later notifications to the same callback.
 * Renewal and reordering (Observe sequence numbers) are left to the caller.
 */
export class SubscriptionRegistry implements ObserveLayer {
  private subscriptions = new Map<string, Request>();

  get size(): number {
    return this.subscriptions.size;
  }

  sendRequest(request: Request): Request {
    const observe = request.observe;
    if (observe === OBSERVE_REGISTER) {
      this.subscriptions.set(request.tokenHex, request);
    } else if (observe === OBSERVE_DEREGISTER) {
      this.subscriptions.delete(request.tokenHex);
    }
    return request;
  }

  sendEmpty(message: Message): Message {
    return message;
  }

  receiveResponse(transaction: Transaction): void {
    const key = transaction.tokenKey;
    if (!this.subscriptions.has(key)) {
      transaction.notification = false;
      return;
    }

    const response = transaction.response;
    if (response && response.isSuccess && response.observe !== undefined) {
      transaction.notification = true;
      return;
    }

    // Server declined (no Observe option) or answered with an error: one-shot response
    this.subscriptions.delete(key);
    transaction.notification = false;
  }

  isObserving(token: string): boolean {
    return this.subscriptions.has(token);
  }

  cancel(token: string): boolean {
    return this.subscriptions.delete(token);
  }
}
