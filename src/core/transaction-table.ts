import { DuplicateMidError, ValidationError } from './errors.js';
import type { Transaction } from './transaction.js';

/**
 * In-flight transactions keyed by MID and by token.
 *
 * Every operation is synchronous, so each one is atomic with respect to the
 * receiver loop and the retransmission tasks sharing the table.
 */
export class TransactionTable {
  private byMid = new Map<number, Transaction>();
  private byToken = new Map<string, Transaction>();

  get size(): number {
    return this.byMid.size;
  }

  register(transaction: Transaction): void {
    const mid = transaction.mid;
    if (mid === undefined) {
      throw new ValidationError('Transaction request has no MID', { field: 'mid' });
    }
    if (this.byMid.has(mid)) {
      throw new DuplicateMidError(mid);
    }

    this.byMid.set(mid, transaction);
    if (transaction.request.token.length > 0) {
      this.byToken.set(transaction.tokenKey, transaction);
    }
  }

  lookupByMid(mid: number): Transaction | undefined {
    return this.byMid.get(mid);
  }

  lookupByToken(token: Buffer | string): Transaction | undefined {
    const key = typeof token === 'string' ? token : token.toString('hex');
    return this.byToken.get(key);
  }

  /**
   * Delete the entry for `mid` (and its token key when it belongs to the same
   * transaction). No-op if absent.
   */
  remove(mid: number): void {
    const transaction = this.byMid.get(mid);
    if (!transaction) return;

    this.byMid.delete(mid);
    const key = transaction.tokenKey;
    if (this.byToken.get(key) === transaction) {
      this.byToken.delete(key);
    }
  }

  /**
   * Release the MID key only, keeping the transaction reachable by token
   * (block continuations and subscriptions outlive their first MID).
   */
  releaseMid(mid: number): void {
    this.byMid.delete(mid);
  }

  transactions(): Transaction[] {
    return [...new Set([...this.byMid.values(), ...this.byToken.values()])];
  }

  /**
   * Drop transactions older than `maxAgeMs` that no retransmission task owns
   * and `keep` does not claim. Returns the number removed.
   */
  purge(maxAgeMs: number, now: number = Date.now(), keep?: (transaction: Transaction) => boolean): number {
    let removed = 0;
    for (const transaction of this.transactions()) {
      if (transaction.isRetransmitting) continue;
      if (keep?.(transaction)) continue;
      if (now - transaction.createdAt < maxAgeMs) continue;

      if (transaction.mid !== undefined && this.byMid.get(transaction.mid) === transaction) {
        this.byMid.delete(transaction.mid);
      }
      if (this.byToken.get(transaction.tokenKey) === transaction) {
        this.byToken.delete(transaction.tokenKey);
      }
      removed++;
    }
    return removed;
  }

  clear(): void {
    this.byMid.clear();
    this.byToken.clear();
  }
}
