import { randomBytes } from 'node:crypto';
import { DEFAULT_TOKEN_LENGTH, NO_RESPONSE_SUPPRESS_ALL, OBSERVE_REGISTER, OptionNumbers, WELL_KNOWN_CORE, type Method } from '../constants.js';
import { createTransport } from '../transport/target.js';
import type { EngineOptions } from '../types/index.js';
import type { DatagramTransport } from '../types/transport.js';
import { DeliveryEngine } from './engine.js';
import { DeliveryTimeoutError, RequestRejectedError, StateError } from './errors.js';
import { Request, type Response } from './message.js';
import type { Transaction } from './transaction.js';

export interface CoapClientOptions extends Omit<EngineOptions, 'onResponse' | 'onReject'> {
  /**
   * Reject a request that has no response after this many ms.
   * Without it a confirmable request fails only once retransmissions run out.
   */
  responseTimeout?: number;
}

export interface RequestOptions {
  /** @default 'CON' */
  type?: 'CON' | 'NON';
  payload?: Buffer | string;
  query?: string[];
  contentFormat?: number;
  accept?: number;
  /** Overrides the client-wide responseTimeout */
  timeout?: number;
}

export type NotificationHandler = (response: Response) => void;

/**
 * Handle of an active observation
 */
export interface Observation {
  readonly request: Request;
  /** First response, which may already carry the current representation */
  readonly response: Response;
  /** False when the server answered without Observe, i.e. declined */
  readonly active: boolean;
  cancel(): Promise<void>;
}

interface PendingRequest {
  request: Request;
  resolve: (response: Response) => void;
  reject: (error: Error) => void;
  transaction?: Transaction;
  timer?: NodeJS.Timeout;
}

/**
 * Promise-based CoAP client on top of a DeliveryEngine.
 *
 * Responses are correlated to callers by token.
 *
 * @example
 * ```typescript
 * const client = CoapClient.connect('udp://10.0.0.7:5683', { ackTimeout: 3000 });
 * await client.open();
 * const response = await client.get('/sensors/temp');
 * console.log(response.text);
 * await client.close();
 * ```
 */
export class CoapClient<T extends DatagramTransport = DatagramTransport> {
  readonly engine: DeliveryEngine<T>;
  private readonly responseTimeout?: number;
  private pending = new Map<string, PendingRequest>();
  private observers = new Map<string, NotificationHandler>();

  constructor(transport: T, options: CoapClientOptions = {}) {
    const { responseTimeout, ...engineOptions } = options;
    this.responseTimeout = responseTimeout;
    this.engine = new DeliveryEngine(transport, {
      ...engineOptions,
      onResponse: (response, request) => this.handleResponse(response, request),
      onReject: (request) => this.handleReject(request),
    });
  }

  /**
   * Client for a `udp://` or `tcp://` target
   */
  static connect(target: string, options: CoapClientOptions = {}): CoapClient {
    return new CoapClient(createTransport(target), options);
  }

  get transport(): T {
    return this.engine.transport;
  }

  /**
   * Requests still waiting for a response
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  open(): Promise<void> {
    return this.engine.open();
  }

  get(path: string, options?: RequestOptions): Promise<Response> {
    return this.request('GET', path, options);
  }

  put(path: string, payload: Buffer | string, options?: RequestOptions): Promise<Response> {
    return this.request('PUT', path, { ...options, payload });
  }

  post(path: string, payload: Buffer | string, options?: RequestOptions): Promise<Response> {
    return this.request('POST', path, { ...options, payload });
  }

  delete(path: string, options?: RequestOptions): Promise<Response> {
    return this.request('DELETE', path, options);
  }

  /**
   * GET /.well-known/core (RFC 6690 link format)
   */
  discover(options?: RequestOptions): Promise<Response> {
    return this.request('GET', WELL_KNOWN_CORE, options);
  }

  request(method: Method, path: string, options: RequestOptions = {}): Promise<Response> {
    return this.requestPrepared(this.buildRequest(method, path, options), options.timeout);
  }

  /**
   * Send with No-Response: nothing comes back and nothing is retransmitted
   */
  async fire(method: Method, path: string, options: Omit<RequestOptions, 'timeout'> = {}): Promise<void> {
    const request = this.buildRequest(method, path, options);
    request.setOption(OptionNumbers.NO_RESPONSE, NO_RESPONSE_SUPPRESS_ALL);
    await this.engine.send(request);
  }

  /**
   * Register for notifications of `path` (RFC 7641). `onNotification` sees the
   * first response and every notification after it.
   */
  async observe(path: string, onNotification: NotificationHandler, options: RequestOptions = {}): Promise<Observation> {
    const request = this.buildRequest('GET', path, options);
    request.observe = OBSERVE_REGISTER;
    const key = request.tokenHex;

    this.observers.set(key, onNotification);
    let response: Response;
    try {
      response = await this.requestPrepared(request, options.timeout);
    } catch (error) {
      this.observers.delete(key);
      throw error;
    }

    const active = response.isSuccess && response.observe !== undefined;
    if (!active) {
      this.observers.delete(key);
    }

    return {
      request,
      response,
      active,
      cancel: async () => {
        if (!this.observers.delete(key)) return;
        await this.engine.cancelObservation(request);
      },
    };
  }

  /**
   * Close the engine. Requests still in flight reject.
   */
  async close(): Promise<void> {
    await this.engine.close();
    for (const key of [...this.pending.keys()]) {
      this.settle(key)?.reject(new StateError('Client closed before a response arrived'));
    }
    this.observers.clear();
  }

  private async requestPrepared(request: Request, timeout?: number): Promise<Response> {
    const key = request.tokenHex;
    const result = new Promise<Response>((resolve, reject) => {
      this.pending.set(key, { request, resolve, reject });
    });
    // May settle while send() is still awaiting the transport
    result.catch(() => undefined);

    try {
      const transaction = await this.engine.send(request);
      const entry = this.pending.get(key);
      if (entry) {
        entry.transaction = transaction;
        this.armTimeout(entry, timeout ?? this.responseTimeout);
      }
    } catch (error) {
      this.settle(key);
      throw error;
    }

    return result;
  }

  private buildRequest(method: Method, path: string, options: RequestOptions): Request {
    const request = new Request({
      method,
      path,
      type: options.type ?? 'CON',
      query: options.query,
      payload: options.payload,
      // Chosen here so the response can be correlated before send() returns
      token: randomBytes(DEFAULT_TOKEN_LENGTH),
    });
    if (options.contentFormat !== undefined) {
      request.setOption(OptionNumbers.CONTENT_FORMAT, options.contentFormat);
    }
    if (options.accept !== undefined) {
      request.setOption(OptionNumbers.ACCEPT, options.accept);
    }
    return request;
  }

  private armTimeout(entry: PendingRequest, timeout: number | undefined): void {
    if (timeout === undefined) return;

    const key = entry.request.tokenHex;
    entry.timer = setTimeout(() => {
      this.settle(key)?.reject(
        new DeliveryTimeoutError({
          mid: entry.request.mid,
          retransmissions: entry.transaction?.retransmissions ?? 0,
          path: entry.request.path,
        })
      );
    }, timeout);
  }

  /**
   * Remove and return the pending entry for `key`, clearing its timer
   */
  private settle(key: string): PendingRequest | undefined {
    const entry = this.pending.get(key);
    if (!entry) return undefined;
    this.pending.delete(key);
    if (entry.timer) clearTimeout(entry.timer);
    return entry;
  }

  private handleResponse(response: Response | null, request: Request): void {
    const key = request.tokenHex;
    const entry = this.settle(key);

    if (response === null) {
      this.observers.delete(key);
      if (entry) {
        entry.reject(
          new DeliveryTimeoutError({
            mid: request.mid,
            retransmissions: entry.transaction?.retransmissions ?? this.engine.config.maxRetransmit,
            path: request.path,
          })
        );
      }
      return;
    }

    entry?.resolve(response);
    this.observers.get(key)?.(response);
  }

  private handleReject(request: Request): void {
    const key = request.tokenHex;
    this.observers.delete(key);
    this.settle(key)?.reject(new RequestRejectedError({ mid: request.mid, path: request.path }));
  }
}
