/**
 * UDP Transport
 *
 * Datagram link to one fixed CoAP peer over node:dgram.
 * Datagrams from any other address/port are ignored.
 */

import dgram from 'node:dgram';
import { lookup } from 'node:dns/promises';
import {
  TransportUnavailableError,
  TransportWriteError,
  TransportReadError,
  ValidationError,
  errorCode,
} from '../core/errors.js';
import type { DatagramTransport, ReceiveResult } from '../types/transport.js';
import { DatagramInbox } from './inbox.js';

export interface UdpTransportOptions {
  /** Remote host name or address */
  host: string;

  /**
   * Remote port
   * @default 5683
   */
  port?: number;

  /**
   * Socket type
   * @default 'udp4'
   */
  type?: 'udp4' | 'udp6';

  /** Bind to specific local address */
  localAddress?: string;

  /**
   * Bind to specific local port (0 = random)
   * @default 0
   */
  localPort?: number;

  /**
   * Maximum datagram size in bytes
   * @default 1152 (RFC 7252 §4.6 recommended upper bound)
   */
  maxPacketSize?: number;

  /**
   * Datagrams buffered while nobody is receiving
   * @default 256
   */
  maxQueued?: number;
}

export const DEFAULT_COAP_PORT = 5683;

const DEFAULT_OPTIONS = {
  port: DEFAULT_COAP_PORT,
  type: 'udp4',
  localAddress: '',
  localPort: 0,
  maxPacketSize: 1152,
  maxQueued: 256,
} as const;

/**
 * @example
 * ```typescript
 * const transport = new UdpTransport({ host: '192.168.1.40', port: 5683 });
 * const engine = new DeliveryEngine(transport);
 * await engine.open();
 * ```
 */
export class UdpTransport implements DatagramTransport {
  private socket: dgram.Socket | null = null;
  private readonly options: Required<Omit<UdpTransportOptions, 'type'>> & { type: 'udp4' | 'udp6' };
  private readonly inbox: DatagramInbox;
  private remoteAddress = '';

  constructor(options: UdpTransportOptions) {
    if (!options.host) {
      throw new ValidationError('UDP transport needs a remote host', { field: 'host' });
    }
    this.options = {
      host: options.host,
      port: options.port ?? DEFAULT_OPTIONS.port,
      type: options.type ?? DEFAULT_OPTIONS.type,
      localAddress: options.localAddress ?? DEFAULT_OPTIONS.localAddress,
      localPort: options.localPort ?? DEFAULT_OPTIONS.localPort,
      maxPacketSize: options.maxPacketSize ?? DEFAULT_OPTIONS.maxPacketSize,
      maxQueued: options.maxQueued ?? DEFAULT_OPTIONS.maxQueued,
    };
    this.inbox = new DatagramInbox(this.options.maxQueued);
  }

  get peer(): string {
    return `udp://${this.options.host}:${this.options.port}`;
  }

  /**
   * Local address/port once open
   */
  get localAddress(): { address: string; port: number } | null {
    if (!this.socket) return null;
    const address = this.socket.address();
    return { address: address.address, port: address.port };
  }

  async open(): Promise<void> {
    if (this.socket) return;

    try {
      const resolved = await lookup(this.options.host, {
        family: this.options.type === 'udp6' ? 6 : 4,
      });
      this.remoteAddress = resolved.address;
    } catch (err) {
      throw new TransportUnavailableError(`Cannot resolve ${this.options.host}`, {
        transport: this.peer,
        code: errorCode(err),
        cause: err,
      });
    }

    const socket = dgram.createSocket({ type: this.options.type, reuseAddr: true });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(
          new TransportUnavailableError(`Cannot bind UDP socket: ${err.message}`, {
            transport: this.peer,
            code: errorCode(err),
            cause: err,
          })
        );
      };
      socket.once('error', onError);
      socket.bind(this.options.localPort, this.options.localAddress || undefined, () => {
        socket.removeListener('error', onError);
        resolve();
      });
    });

    socket.on('message', (msg, rinfo) => {
      if (rinfo.address !== this.remoteAddress || rinfo.port !== this.options.port) {
        return;
      }
      this.inbox.push(msg);
    });

    socket.on('error', (err) => {
      this.inbox.fail(
        new TransportReadError(`UDP socket error: ${err.message}`, { code: errorCode(err), cause: err }),
        true
      );
    });

    this.inbox.reset();
    this.socket = socket;
  }

  send(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new TransportWriteError(`UDP transport to ${this.peer} is not open`));
    }
    if (data.length > this.options.maxPacketSize) {
      return Promise.reject(
        new TransportWriteError(
          `Packet size ${data.length} exceeds maximum ${this.options.maxPacketSize} bytes`,
          { code: 'EMSGSIZE' }
        )
      );
    }

    return new Promise((resolve, reject) => {
      socket.send(data, this.options.port, this.remoteAddress, (err) => {
        if (err) {
          reject(new TransportWriteError(err.message, { code: errorCode(err), cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs: number): Promise<ReceiveResult> {
    if (!this.socket) {
      return Promise.reject(new TransportReadError(`UDP transport to ${this.peer} is not open`));
    }
    return this.inbox.receive(timeoutMs);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;

    this.socket = null;
    this.inbox.close();
    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
  }
}
