import type { BlockLayer, Codec, ErrorDecision, ObserveLayer } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { DatagramTransport, ReceiveResult } from '../types/transport.js';
import { waitOrAbort } from '../utils/wait.js';
import { asError } from './errors.js';
import { Message, Request, Response } from './message.js';
import type { EngineState } from './state.js';
import type { Transaction } from './transaction.js';
import type { TransactionTable } from './transaction-table.js';

/**
 * What the receiver loop needs from its engine
 */
export interface ReceiverHost {
  readonly state: EngineState;
  readonly table: TransactionTable;
  readonly transport: DatagramTransport;
  readonly codec: Codec;
  readonly logger: Logger;
  readonly blockLayer: BlockLayer;
  readonly observeLayer: ObserveLayer;
  decideRead(error: Error): ErrorDecision;
  /** Encode and send an empty ACK/RST */
  sendControl(message: Message): Promise<void>;
  /** Send the continuation request prepared by the block collaborator */
  continueBlockTransfer(transaction: Transaction): Promise<void>;
  /** Invoke the application callback */
  deliver(response: Response | null, request: Request): void;
  /** Report a request the peer answered with RST */
  reject(request: Request): void;
  /** Stop the engine after an escalated read failure */
  halt(error: Error): void;
}

/**
 * Drains inbound datagrams and routes them to pending transactions.
 *
 * `receive` is bounded by `pollInterval`, so the global stop flag is observed
 * at least that often. MIDs of acknowledged inbound CON responses are kept for
 * `duplicateWindow` ms; a resent copy is ACKed again and not redelivered.
 */
export class ReceiverLoop {
  /** MID -> time the CON response was first acknowledged */
  private readonly recentCon = new Map<number, number>();

  constructor(
    private readonly host: ReceiverHost,
    private readonly pollInterval: number,
    private readonly duplicateWindow: number,
    private readonly now: () => number = Date.now
  ) {}

  async run(): Promise<void> {
    const { state, transport, logger } = this.host;
    const signal = state.stop.signal;
    logger.debug(`Receiver loop started for ${transport.peer}`);

    while (!signal.aborted) {
      let result: ReceiveResult;
      try {
        result = await transport.receive(this.pollInterval);
      } catch (err) {
        if (signal.aborted) break;

        const error = asError(err);
        if (this.host.decideRead(error) === 'continue') {
          logger.debug(`Read error ignored: ${error.message}`);
          await waitOrAbort(this.pollInterval, signal);
          continue;
        }
        logger.error(`Receiver loop stopped: ${error.message}`);
        this.host.halt(error);
        break;
      }

      if (result.kind === 'timeout') continue;

      try {
        await this.handleDatagram(result.data);
      } catch (err) {
        logger.error(`Failed to process datagram: ${asError(err).message}`);
      }
    }

    logger.debug('Receiver loop exited');
  }

  async handleDatagram(data: Buffer): Promise<void> {
    let message: Message;
    try {
      message = this.host.codec.decode(data);
    } catch (err) {
      this.host.logger.debug(`Discarding malformed datagram (${data.length}B): ${asError(err).message}`);
      return;
    }

    this.host.logger.debug(`receive_datagram - ${message.describe()}`);

    if (message instanceof Response) {
      await this.handleResponse(message);
    } else if (message instanceof Request) {
      await this.handleRequest(message);
    } else {
      await this.handleEmpty(message);
    }
  }

  private match(response: Response): Transaction | undefined {
    const { table, logger } = this.host;

    if (response.type === 'ACK' && response.mid !== undefined) {
      const transaction = table.lookupByMid(response.mid);
      if (transaction) {
        if (transaction.request.token.equals(response.token)) {
          return transaction;
        }
        logger.warn(`Tokens do not match for MID ${response.mid} - discarding response`);
        return undefined;
      }
    }

    if (response.token.length === 0) return undefined;
    return table.lookupByToken(response.token);
  }

  private isDuplicateCon(mid: number): boolean {
    const seenAt = this.recentCon.get(mid);
    if (seenAt === undefined) return false;
    if (this.now() - seenAt > this.duplicateWindow) {
      this.recentCon.delete(mid);
      return false;
    }
    return true;
  }

  private rememberCon(mid: number): void {
    const now = this.now();
    for (const [seen, seenAt] of this.recentCon) {
      if (now - seenAt > this.duplicateWindow) {
        this.recentCon.delete(seen);
      }
    }
    this.recentCon.set(mid, now);
  }

  private async handleResponse(response: Response): Promise<void> {
    const { table, logger, blockLayer, observeLayer } = this.host;

    if (response.type === 'CON' && response.mid !== undefined && this.isDuplicateCon(response.mid)) {
      logger.debug(`Duplicate CON MID ${response.mid} - acknowledging again`);
      await this.host.sendControl(new Message({ type: 'ACK', mid: response.mid }));
      return;
    }

    const transaction = this.match(response);

    if (!transaction) {
      logger.debug(`Unmatched response ${response.describe()} - discarding`);
      if (response.type === 'CON' && response.mid !== undefined) {
        // Also tells the server to drop an observation we no longer hold
        await this.host.sendControl(new Message({ type: 'RST', mid: response.mid }));
      }
      return;
    }

    await transaction.resolve('acknowledged', response);
    transaction.completed = true;

    if (response.type === 'CON' && response.mid !== undefined) {
      this.rememberCon(response.mid);
      await this.host.sendControl(new Message({ type: 'ACK', mid: response.mid }));
    }

    const mid = transaction.mid;
    blockLayer.receiveResponse(transaction);
    if (transaction.blockTransfer) {
      if (mid !== undefined) table.remove(mid);
      await this.host.continueBlockTransfer(transaction);
      return;
    }

    observeLayer.receiveResponse(transaction);
    if (!transaction.notification && mid !== undefined) {
      table.remove(mid);
    }

    this.host.deliver(response, transaction.request);
  }

  private async handleEmpty(message: Message): Promise<void> {
    const { table, logger, observeLayer } = this.host;

    if (message.type === 'CON' || message.type === 'NON') {
      // CoAP ping
      if (message.type === 'CON' && message.mid !== undefined) {
        await this.host.sendControl(new Message({ type: 'RST', mid: message.mid }));
      }
      return;
    }

    const transaction = message.mid === undefined ? undefined : table.lookupByMid(message.mid);
    if (!transaction) {
      logger.debug(`Unmatched ${message.type} MID=${message.mid} - discarding`);
      return;
    }

    if (message.type === 'ACK') {
      await transaction.resolve('acknowledged');
      logger.debug(`MID ${message.mid} acknowledged, waiting for separate response`);
      return;
    }

    await transaction.resolve('rejected');
    if (message.mid !== undefined) {
      table.remove(message.mid);
    }
    observeLayer.cancel(transaction.tokenKey);
    logger.info(`MID ${message.mid} rejected by ${this.host.transport.peer}`);
    this.host.reject(transaction.request);
  }

  private async handleRequest(request: Request): Promise<void> {
    this.host.logger.debug(`Ignoring inbound request ${request.describe()}`);
    if (request.type === 'CON' && request.mid !== undefined) {
      await this.host.sendControl(new Message({ type: 'RST', mid: request.mid }));
    }
  }
}
