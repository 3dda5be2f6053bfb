/**
 * Mock CoAP Server
 *
 * Loopback CoAP server for testing UDP clients. Serves registered resources
 * with piggybacked or separate responses, can drop incoming datagrams and
 * keeps Observe registrations.
 *
 * @example
 * ```typescript
 * import { MockCoapServer } from 'coaplink/testing';
 *
 * const server = await MockCoapServer.create();
 * server.setResource('/temperature', { payload: '21.5' });
 * server.dropNext(2); // lose the first two datagrams
 *
 * const client = new CoapClient(new UdpTransport({ host: '127.0.0.1', port: server.port }));
 * ```
 */

import dgram from 'node:dgram';
import { EventEmitter } from 'node:events';
import { CoapCodec } from '../codec/coap-codec.js';
import { ContentFormats, OBSERVE_DEREGISTER, OBSERVE_REGISTER, OptionNumbers, ResponseCodes, WELL_KNOWN_CORE } from '../constants.js';
import { Message, Request, Response } from '../core/message.js';

export interface MockCoapServerOptions {
  /**
   * Port to bind to (0 = random available port)
   * @default 0
   */
  port?: number;

  /**
   * Address to bind to
   * @default '127.0.0.1'
   */
  host?: string;

  /**
   * Delay before responding (ms)
   * @default 0
   */
  delay?: number;

  /**
   * Answer CON requests with an empty ACK first and the response later
   * @default false
   */
  separate?: boolean;
}

export interface ResourceReply {
  /** @default 2.05 Content */
  code?: number;
  payload?: Buffer | string;
  contentFormat?: number;
}

export type ResourceHandler = (request: Request) => ResourceReply | null;

export interface ReceivedMessage {
  message: Message;
  data: Buffer;
  rinfo: dgram.RemoteInfo;
  timestamp: number;
}

interface Observer {
  path: string;
  token: Buffer;
  rinfo: dgram.RemoteInfo;
}

export class MockCoapServer extends EventEmitter {
  private socket: dgram.Socket | null = null;
  private options: Required<MockCoapServerOptions>;
  private readonly codec = new CoapCodec();
  private resources = new Map<string, ResourceHandler>();
  private observers = new Map<string, Observer>();
  /** Notification MID -> observer key, so a RST can cancel the observation */
  private notificationMids = new Map<number, string>();
  private _port = 0;
  private _received: ReceivedMessage[] = [];
  private dropCount = 0;
  private _dropped = 0;
  private nextMid = 0x4000;
  private observeSequence = 2;

  constructor(options: MockCoapServerOptions = {}) {
    super();
    this.options = {
      port: 0,
      host: '127.0.0.1',
      delay: 0,
      separate: false,
      ...options,
    };
  }

  get port(): number {
    return this._port;
  }

  get address(): string {
    return this.options.host;
  }

  get isRunning(): boolean {
    return this.socket !== null;
  }

  get receivedMessages(): ReceivedMessage[] {
    return [...this._received];
  }

  get messageCount(): number {
    return this._received.length;
  }

  /**
   * Datagrams discarded through dropNext()
   */
  get dropped(): number {
    return this._dropped;
  }

  get observerCount(): number {
    return this.observers.size;
  }

  async start(): Promise<void> {
    if (this.socket) {
      throw new Error('Server already started');
    }

    const socket = dgram.createSocket('udp4');
    socket.on('message', (data, rinfo) => {
      this.handle(data, rinfo).catch((err: unknown) => this.emit('error', err));
    });
    socket.on('error', (err) => {
      this.emit('error', err);
    });

    await new Promise<void>((resolve) => {
      socket.bind(this.options.port, this.options.host, () => {
        this._port = socket.address().port;
        resolve();
      });
    });
    this.socket = socket;
    this.emit('listening', this._port);
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;

    this.socket = null;
    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
    this.emit('close');
  }

  /**
   * Serve `path` with a fixed reply or a handler. Unknown paths answer 4.04.
   */
  setResource(path: string, reply: ResourceReply | ResourceHandler): void {
    this.resources.set(path, typeof reply === 'function' ? reply : () => reply);
  }

  removeResource(path: string): void {
    this.resources.delete(path);
  }

  /**
   * Silently discard the next `count` datagrams
   */
  dropNext(count: number): void {
    this.dropCount = count;
  }

  setDelay(delay: number): void {
    this.options.delay = delay;
  }

  setSeparate(enabled: boolean): void {
    this.options.separate = enabled;
  }

  clearMessages(): void {
    this._received = [];
  }

  reset(): void {
    this.clearMessages();
    this.resources.clear();
    this.observers.clear();
    this.notificationMids.clear();
    this.dropCount = 0;
    this._dropped = 0;
    this.options.delay = 0;
    this.options.separate = false;
  }

  /**
   * Push a NON notification of `path` to every registered observer
   */
  async notify(path: string, reply: ResourceReply): Promise<number> {
    let sent = 0;
    for (const observer of this.observers.values()) {
      if (observer.path !== path) continue;
      const mid = this.allocateMid();
      const response = this.buildResponse('NON', mid, observer.token, reply);
      response.observe = this.observeSequence++;
      this.notificationMids.set(mid, observer.token.toString('hex'));
      await this.sendTo(response, observer.rinfo);
      sent++;
    }
    return sent;
  }

  async waitForMessages(count: number, timeout: number = 5000): Promise<ReceivedMessage[]> {
    const startTime = Date.now();

    while (this._received.length < count) {
      if (Date.now() - startTime > timeout) {
        throw new Error(`Timeout waiting for ${count} messages (received ${this._received.length})`);
      }
      await new Promise((resolve) => setTimeout(resolve, 10));
    }

    return this._received.slice(0, count);
  }

  static async create(options: MockCoapServerOptions = {}): Promise<MockCoapServer> {
    const server = new MockCoapServer(options);
    await server.start();
    return server;
  }

  private async handle(data: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    let message: Message;
    try {
      message = this.codec.decode(data);
    } catch {
      this.emit('malformed', data, rinfo);
      return;
    }

    this._received.push({ message, data, rinfo, timestamp: Date.now() });
    this.emit('message', message, rinfo);

    if (this.dropCount > 0) {
      this.dropCount--;
      this._dropped++;
      this.emit('dropped', message, rinfo);
      return;
    }

    if (!(message instanceof Request)) {
      if (message.type === 'RST') {
        this.dropObserversByMid(message);
      } else if (message.type === 'CON' && message.mid !== undefined) {
        // CoAP ping
        await this.sendTo(new Message({ type: 'RST', mid: message.mid }), rinfo);
      }
      return;
    }

    if (this.options.delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delay));
    }

    if (message.suppressesResponse) return;

    const reply = this.serve(message);
    if (!reply) return;
    const observing = this.trackObserver(message, reply, rinfo);

    if (message.type === 'CON' && !this.options.separate) {
      const response = this.buildResponse('ACK', message.mid ?? 0, message.token, reply);
      if (observing) response.observe = this.observeSequence++;
      await this.sendTo(response, rinfo);
      return;
    }

    if (message.type === 'CON' && message.mid !== undefined) {
      await this.sendTo(new Message({ type: 'ACK', mid: message.mid }), rinfo);
    }
    const response = this.buildResponse(
      message.type === 'CON' ? 'CON' : 'NON',
      this.allocateMid(),
      message.token,
      reply
    );
    if (observing) response.observe = this.observeSequence++;
    await this.sendTo(response, rinfo);
  }

  private serve(request: Request): ResourceReply | null {
    const path = request.path;

    if (path === WELL_KNOWN_CORE && !this.resources.has(path)) {
      const links = [...this.resources.keys()].map((resource) => `<${resource}>`).join(',');
      return { payload: links, contentFormat: ContentFormats.LINK_FORMAT };
    }

    const handler = this.resources.get(path);
    if (!handler) {
      return { code: ResponseCodes.NOT_FOUND };
    }
    return handler(request);
  }

  private trackObserver(request: Request, reply: ResourceReply, rinfo: dgram.RemoteInfo): boolean {
    const key = request.tokenHex;
    if (request.observe === OBSERVE_DEREGISTER) {
      this.observers.delete(key);
      return false;
    }
    if (request.observe !== OBSERVE_REGISTER) return false;

    const code = reply.code ?? ResponseCodes.CONTENT;
    if (code >> 5 !== 2) return false;

    this.observers.set(key, { path: request.path, token: Buffer.from(request.token), rinfo });
    return true;
  }

  private dropObserversByMid(message: Message): void {
    // A RST for a notification cancels the observation that produced it
    const key = message.mid === undefined ? undefined : this.notificationMids.get(message.mid);
    if (key !== undefined) {
      this.observers.delete(key);
    }
    this.emit('reset', message);
  }

  private buildResponse(type: Message['type'], mid: number, token: Buffer, reply: ResourceReply): Response {
    const response = new Response({
      type,
      mid,
      token,
      code: reply.code ?? ResponseCodes.CONTENT,
      payload: reply.payload,
    });
    if (reply.contentFormat !== undefined) {
      response.setOption(OptionNumbers.CONTENT_FORMAT, reply.contentFormat);
    }
    return response;
  }

  private allocateMid(): number {
    const mid = this.nextMid;
    this.nextMid = (this.nextMid + 1) % 0x10000;
    return mid;
  }

  private sendTo(message: Message, rinfo: dgram.RemoteInfo): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.resolve();

    const data = this.codec.encode(message);
    return new Promise((resolve, reject) => {
      socket.send(data, rinfo.port, rinfo.address, (err) => {
        if (err) {
          reject(err);
        } else {
          this.emit('sent', message, rinfo);
          resolve();
        }
      });
    });
  }
}
