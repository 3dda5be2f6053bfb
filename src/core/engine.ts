import { randomBytes, randomInt } from 'node:crypto';
import { CoapCodec } from '../codec/coap-codec.js';
import { resolveEngineConfig, parseMid, type EngineConfig } from '../config.js';
import { DEFAULT_TOKEN_LENGTH, MID_SPACE, OBSERVE_DEREGISTER } from '../constants.js';
import { PassthroughBlockLayer } from '../layers/block.js';
import { SubscriptionRegistry } from '../layers/observe.js';
import type {
  BlockLayer,
  Codec,
  EngineLifecycle,
  EngineOptions,
  ErrorDecision,
  ErrorPolicy,
  ObserveLayer,
  RejectCallback,
  ResponseCallback,
} from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { DatagramTransport } from '../types/transport.js';
import { getLogger } from '../utils/logger.js';
import { StateError, TransportUnavailableError, asError } from './errors.js';
import { Message, Request, type Response } from './message.js';
import { ReceiverLoop, type ReceiverHost } from './receiver.js';
import { RetransmissionScheduler } from './retransmission.js';
import { EngineState } from './state.js';
import { Transaction } from './transaction.js';
import { TransactionTable } from './transaction-table.js';

/**
 * Reliable request/response delivery over an unreliable datagram link.
 *
 * @example
 * ```typescript
 * import { DeliveryEngine, Request, UdpTransport } from 'coaplink';
 *
 * const engine = new DeliveryEngine(new UdpTransport({ host: '10.0.0.7', port: 5683 }), {
 *   onResponse: (response) => console.log(response?.text ?? 'no response'),
 * });
 * await engine.open();
 * await engine.send(new Request({ method: 'GET', path: '/temperature' }));
 * // ...
 * await engine.close();
 * ```
 */
export class DeliveryEngine<T extends DatagramTransport = DatagramTransport> implements ReceiverHost {
  readonly transport: T;
  readonly state: EngineState;
  readonly table = new TransactionTable();
  readonly config: EngineConfig;
  readonly codec: Codec;
  readonly logger: Logger;
  readonly blockLayer: BlockLayer;
  readonly observeLayer: ObserveLayer;

  private readonly onResponse?: ResponseCallback;
  private readonly onReject?: RejectCallback;
  private readonly readPolicy?: ErrorPolicy;
  private readonly writePolicy?: ErrorPolicy;
  private readonly scheduler: RetransmissionScheduler;
  private receiverTask?: Promise<void>;
  private purgeTimer?: NodeJS.Timeout;
  private opening?: Promise<void>;
  private closing?: Promise<void>;
  private haltReason?: Error;

  constructor(transport: T, options: EngineOptions = {}) {
    this.transport = transport;
    this.config = resolveEngineConfig(options);
    this.state = new EngineState(
      options.startingMid === undefined ? randomInt(0, MID_SPACE) : parseMid(options.startingMid)
    );
    this.codec = options.codec ?? new CoapCodec();
    this.logger = options.logger ?? getLogger();
    this.blockLayer = options.blockLayer ?? new PassthroughBlockLayer();
    this.observeLayer = options.observeLayer ?? new SubscriptionRegistry();
    this.onResponse = options.onResponse;
    this.onReject = options.onReject;
    this.readPolicy = options.readPolicy;
    this.writePolicy = options.writePolicy;

    this.scheduler = new RetransmissionScheduler({
      state: this.state,
      table: this.table,
      config: this.config,
      random: options.random ?? Math.random,
      logger: this.logger,
      transmit: (datagram) => this.transmit(datagram),
      giveUp: (transaction) => this.deliver(null, transaction.request),
    });
  }

  get lifecycle(): EngineLifecycle {
    return this.state.lifecycle;
  }

  get currentMid(): number {
    return this.state.currentMid;
  }

  set currentMid(value: number) {
    this.state.currentMid = parseMid(value);
  }

  /**
   * True while a receiver loop task exists
   */
  get receiving(): boolean {
    return this.receiverTask !== undefined;
  }

  /**
   * Acquire the transport. Safe to call more than once.
   */
  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.doOpen();
    }
    return this.opening;
  }

  private async doOpen(): Promise<void> {
    if (this.state.lifecycle !== 'idle') {
      throw new StateError('Engine cannot be reopened', {
        expectedState: 'idle',
        actualState: this.state.lifecycle,
      });
    }

    try {
      await this.transport.open();
    } catch (err) {
      this.opening = undefined;
      if (err instanceof TransportUnavailableError) throw err;
      const error = asError(err);
      throw new TransportUnavailableError(`Cannot open ${this.transport.peer}: ${error.message}`, {
        transport: this.transport.peer,
        cause: error,
      });
    }

    this.state.lifecycle = 'open';
    this.logger.info(`Link to ${this.transport.peer} open`);
  }

  /**
   * Send a request or an empty control message.
   *
   * Requests are registered as transactions; confirmable ones are retransmitted
   * until acknowledged, rejected or out of retries. Returns the transaction, or
   * undefined for empty messages and No-Response requests.
   */
  async send(message: Message): Promise<Transaction | undefined> {
    this.assertOpen();

    if (message instanceof Request) {
      let request = this.prepareRequest(message);
      request = this.observeLayer.sendRequest(request);
      request = this.blockLayer.sendRequest(request);
      return this.dispatch(request);
    }

    const outgoing = this.observeLayer.sendEmpty(message);
    if (outgoing.mid === undefined) {
      outgoing.mid = this.allocateMid();
    }
    this.logger.debug(`send_datagram - ${outgoing.describe()}`);
    await this.transmit(this.codec.encode(outgoing));
    if (!outgoing.suppressesResponse) {
      this.startReceiver();
    }
    return undefined;
  }

  /**
   * Drop a subscription and ask the server to stop notifying
   */
  async cancelObservation(request: Request): Promise<void> {
    const token = request.tokenHex;
    this.observeLayer.cancel(token);

    const transaction = this.table.lookupByToken(token);
    if (transaction?.mid !== undefined) {
      this.table.remove(transaction.mid);
    }

    const deregister = new Request({
      method: request.method ?? 'GET',
      type: request.type,
      token: request.token,
      options: request.options,
    });
    deregister.observe = OBSERVE_DEREGISTER;
    await this.send(deregister);
  }

  /**
   * Stop the receiver loop and every retransmission task, then release the
   * transport. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const wasOpen = this.state.lifecycle === 'open' || this.state.lifecycle === 'stopped';
    this.state.stop.abort();
    this.stopPurge();

    const tasks = this.state.stopAll();
    await Promise.all([this.receiverTask, ...tasks]);

    if (wasOpen) {
      await this.transport.close();
    }
    this.table.clear();
    this.state.lifecycle = 'closed';
    this.logger.debug(`Engine for ${this.transport.peer} closed`);
  }

  private async dispatch(request: Request): Promise<Transaction | undefined> {
    const mid = request.mid ?? this.allocateMid();
    request.mid = mid;

    const datagram = this.codec.encode(request);
    const transaction = new Transaction(request);
    this.table.register(transaction);

    this.logger.debug(`send_datagram - ${request.describe()}`);
    try {
      await this.transmit(datagram);
    } catch (error) {
      this.table.remove(mid);
      throw error;
    }

    // No-Response (RFC 7967): nothing will come back, so nothing is tracked
    if (request.suppressesResponse) {
      this.table.remove(mid);
      return undefined;
    }

    this.startReceiver();
    if (request.type === 'CON') {
      this.scheduler.arm(transaction, datagram);
    }
    return transaction;
  }

  private prepareRequest(request: Request): Request {
    if (request.type !== 'CON' && request.type !== 'NON') {
      request.type = 'CON';
    }
    if (request.token.length === 0) {
      request.token = randomBytes(DEFAULT_TOKEN_LENGTH);
    }
    request.acknowledged = false;
    request.rejected = false;
    request.timedOut = false;
    return request;
  }

  /**
   * Next MID not held by a live transaction
   */
  private allocateMid(): number {
    for (let attempt = 0; attempt < MID_SPACE; attempt++) {
      const mid = this.state.nextMid();
      if (!this.table.lookupByMid(mid)) {
        return mid;
      }
    }
    throw new StateError('All 65536 message IDs are held by live transactions');
  }

  private assertOpen(): void {
    if (this.state.lifecycle !== 'open' || this.state.stopped) {
      throw new StateError(
        this.haltReason
          ? `Engine stopped after receive failure: ${this.haltReason.message}`
          : 'Engine is not open',
        { expectedState: 'open', actualState: this.state.lifecycle }
      );
    }
  }

  /**
   * Send a datagram, consulting the write policy on failure
   */
  private async transmit(datagram: Buffer): Promise<void> {
    try {
      await this.transport.send(datagram);
    } catch (err) {
      const error = asError(err);
      if (this.decideWrite(error) === 'continue') {
        this.logger.debug(`Write error ignored: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  /**
   * At most one receiver loop per engine: the task handle is set once and
   * never replaced, because the loop only ends when the engine stops.
   */
  private startReceiver(): void {
    if (this.receiverTask) return;

    const loop = new ReceiverLoop(this, this.config.pollInterval, this.config.exchangeLifetime);
    this.receiverTask = loop.run();
    this.startPurge();
  }

  private startPurge(): void {
    this.purgeTimer = setInterval(() => {
      const removed = this.table.purge(this.config.exchangeLifetime, Date.now(), (transaction) =>
        this.observeLayer.isObserving(transaction.tokenKey)
      );
      if (removed > 0) {
        this.logger.debug(`Purged ${removed} stale transaction(s)`);
      }
    }, this.config.purgeInterval);
    this.purgeTimer.unref();
  }

  private stopPurge(): void {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = undefined;
    }
  }

  // ReceiverHost

  decideRead(error: Error): ErrorDecision {
    return this.readPolicy ? this.readPolicy(error, this) : 'escalate';
  }

  decideWrite(error: Error): ErrorDecision {
    return this.writePolicy ? this.writePolicy(error, this) : 'escalate';
  }

  async sendControl(message: Message): Promise<void> {
    this.logger.debug(`send_datagram - ${message.describe()}`);
    await this.transmit(this.codec.encode(message));
  }

  async continueBlockTransfer(transaction: Transaction): Promise<void> {
    const next = transaction.request;
    next.mid = undefined;
    await this.dispatch(this.prepareRequest(next));
  }

  deliver(response: Response | null, request: Request): void {
    if (!this.onResponse) return;
    try {
      this.onResponse(response, request);
    } catch (err) {
      this.logger.error(`Response callback threw: ${asError(err).message}`);
    }
  }

  reject(request: Request): void {
    if (!this.onReject) return;
    try {
      this.onReject(request);
    } catch (err) {
      this.logger.error(`Reject callback threw: ${asError(err).message}`);
    }
  }

  halt(error: Error): void {
    this.haltReason = error;
    this.state.lifecycle = 'stopped';
    this.state.stop.abort();
    this.state.stopAll();
    this.stopPurge();
  }
}
