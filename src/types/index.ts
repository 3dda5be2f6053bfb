import type { EngineConfig } from '../config.js';
import type { DeliveryEngine } from '../core/engine.js';
import type { Message, Request, Response } from '../core/message.js';
import type { Transaction } from '../core/transaction.js';
import type { Logger } from './logger.js';

export type { DatagramTransport, ReceiveResult } from './transport.js';
export type { Logger } from './logger.js';

/**
 * Serializes messages to datagrams and back.
 * `decode` throws DecodeError on malformed input.
 */
export interface Codec {
  encode(message: Message): Buffer;
  decode(data: Buffer): Message;
}

/**
 * Block-wise transfer collaborator (RFC 7959).
 *
 * `receiveResponse` sets `transaction.blockTransfer` and replaces
 * `transaction.request` with the continuation when another round is needed.
 */
export interface BlockLayer {
  sendRequest(request: Request): Request;
  receiveResponse(transaction: Transaction): void;
}

/**
 * Observe collaborator (RFC 7641).
 *
 * `receiveResponse` sets `transaction.notification` for responses that belong
 * to an active subscription.
 */
export interface ObserveLayer {
  sendRequest(request: Request): Request;
  sendEmpty(message: Message): Message;
  receiveResponse(transaction: Transaction): void;
  isObserving(token: string): boolean;
  cancel(token: string): boolean;
}

/**
 * Invoked with the completed response, or `null` when a confirmable message
 * exhausted its retransmissions (or was abandoned by close()).
 */
export type ResponseCallback = (response: Response | null, request: Request) => void;

/**
 * Invoked when the peer rejects a confirmable request with RST
 */
export type RejectCallback = (request: Request) => void;

export type ErrorDecision = 'continue' | 'escalate';

/**
 * Decides whether a transient I/O error is swallowed or escalated
 */
export type ErrorPolicy = (error: Error, engine: DeliveryEngine) => ErrorDecision;

export interface EngineOptions extends Partial<EngineConfig> {
  /**
   * First MID handed out
   * @default random in 0..65535
   */
  startingMid?: number;

  /**
   * Random source in [0, 1) used for the initial backoff draw
   * @default Math.random
   */
  random?: () => number;

  /**
   * Logger instance (Pino, Winston, console, or custom)
   * @default ConsoleLogger driven by DEBUG
   */
  logger?: Logger;

  codec?: Codec;
  blockLayer?: BlockLayer;
  observeLayer?: ObserveLayer;
  onResponse?: ResponseCallback;
  onReject?: RejectCallback;

  /**
   * Policy for read failures in the receiver loop
   * @default escalate (the receiver loop stops and the engine halts)
   */
  readPolicy?: ErrorPolicy;

  /**
   * Policy for write failures on any send path
   * @default escalate (the error propagates to the caller)
   */
  writePolicy?: ErrorPolicy;
}

export type EngineLifecycle = 'idle' | 'open' | 'stopped' | 'closed';
