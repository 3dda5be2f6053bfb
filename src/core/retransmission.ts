import type { EngineConfig } from '../config.js';
import type { Logger } from '../types/logger.js';
import { waitOrAbort } from '../utils/wait.js';
import { asError } from './errors.js';
import type { EngineState, RetransmissionControl } from './state.js';
import type { Transaction } from './transaction.js';
import type { TransactionTable } from './transaction-table.js';

export interface RetransmissionContext {
  state: EngineState;
  table: TransactionTable;
  config: Pick<EngineConfig, 'ackTimeout' | 'ackRandomFactor' | 'maxRetransmit'>;
  random: () => number;
  logger: Logger;
  /** Resend a datagram; rejects when the write policy escalates */
  transmit(datagram: Buffer): Promise<void>;
  /** Report definitive delivery failure to the application */
  giveUp(transaction: Transaction): void;
}

type StepOutcome = 'resolved' | 'retransmitted' | 'exhausted';

/**
 * Confirmable-message retransmission (RFC 7252 §4.2).
 *
 * One task per transaction: wait the current backoff or until the stop signal
 * fires, then resend the same encoded bytes and double the backoff, at most
 * `maxRetransmit` times.
 */
export class RetransmissionScheduler {
  constructor(private readonly ctx: RetransmissionContext) {}

  /**
   * Uniform draw in [ackTimeout, ackTimeout * ackRandomFactor]
   */
  initialBackoff(): number {
    const { ackTimeout, ackRandomFactor } = this.ctx.config;
    return ackTimeout + this.ctx.random() * (ackTimeout * ackRandomFactor - ackTimeout);
  }

  /**
   * Start the retransmission task for `transaction`. The task is tracked on the
   * transaction and in the engine's live set; a transaction already owning a
   * task is left alone.
   */
  arm(transaction: Transaction, datagram: Buffer): void {
    if (transaction.retransmission) return;

    const stop = new AbortController();
    const control: RetransmissionControl = { stop, task: Promise.resolve() };
    transaction.retransmitStop = stop;
    this.ctx.state.live.add(control);

    const task = this.run(transaction, datagram, stop.signal, control);
    control.task = task;
    transaction.retransmission = task;
  }

  private async run(
    transaction: Transaction,
    datagram: Buffer,
    signal: AbortSignal,
    control: RetransmissionControl
  ): Promise<void> {
    const { logger, config } = this.ctx;
    const { request } = transaction;
    let backoff = this.initialBackoff();
    let timedOut = false;

    logger.debug(`Retransmission armed for MID ${request.mid} (first timeout ${Math.round(backoff)}ms)`);

    try {
      while (!transaction.isResolved && !signal.aborted) {
        await waitOrAbort(backoff, signal);

        const outcome = await transaction.lock.runExclusive(async (): Promise<StepOutcome> => {
          if (transaction.isResolved || signal.aborted) return 'resolved';
          if (transaction.retransmissions >= config.maxRetransmit) return 'exhausted';

          transaction.retransmissions++;
          backoff *= 2;
          logger.debug(
            `Retransmit ${transaction.retransmissions}/${config.maxRetransmit} of ${request.describe()}`
          );
          await this.ctx.transmit(datagram);
          return 'retransmitted';
        });

        if (outcome === 'exhausted') break;
      }
    } catch (error) {
      logger.error(`Retransmission of MID ${request.mid} aborted: ${asError(error).message}`);
    } finally {
      timedOut = await transaction.lock.runExclusive(() => {
        request.timedOut = !transaction.isResolved;
        this.ctx.state.live.delete(control);
        transaction.retransmission = undefined;
        transaction.retransmitStop = undefined;
        return request.timedOut;
      });
    }

    if (timedOut) {
      logger.warn(`Give up on message ${request.describe()}`);
      if (request.mid !== undefined) {
        this.ctx.table.remove(request.mid);
      }
      this.ctx.giveUp(transaction);
    }
  }
}
