import type { Request } from '../core/message.js';
import type { Transaction } from '../core/transaction.js';
import type { BlockLayer } from '../types/index.js';

/**
 * Default block collaborator: requests go out as-is and every response
 * completes its exchange in one round.
 */
export class PassthroughBlockLayer implements BlockLayer {
  sendRequest(request: Request): Request {
    return request;
  }

  receiveResponse(transaction: Transaction): void {
    transaction.blockTransfer = false;
  }
}
