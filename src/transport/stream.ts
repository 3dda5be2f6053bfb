/**
 * Stream Transport
 *
 * Carries datagrams over a byte stream (serial line, radio modem, TCP bridge)
 * using SLIP framing (RFC 1055).
 */

import net from 'node:net';
import type { Duplex } from 'node:stream';
import {
  TransportReadError,
  TransportUnavailableError,
  TransportWriteError,
  asError,
  errorCode,
} from '../core/errors.js';
import type { DatagramTransport, ReceiveResult } from '../types/transport.js';
import { DatagramInbox } from './inbox.js';

export const SLIP_END = 0xc0;
export const SLIP_ESC = 0xdb;
export const SLIP_ESC_END = 0xdc;
export const SLIP_ESC_ESC = 0xdd;

/** Largest frame the decoder buffers before dropping it */
export const MAX_SLIP_FRAME = 64 * 1024;

/**
 * Frame one datagram. A leading END flushes line noise on the receiving side.
 */
export function slipEncode(data: Buffer): Buffer {
  const out: number[] = [SLIP_END];
  for (const byte of data) {
    if (byte === SLIP_END) {
      out.push(SLIP_ESC, SLIP_ESC_END);
    } else if (byte === SLIP_ESC) {
      out.push(SLIP_ESC, SLIP_ESC_ESC);
    } else {
      out.push(byte);
    }
  }
  out.push(SLIP_END);
  return Buffer.from(out);
}

/**
 * Incremental SLIP decoder: feed arbitrary chunks, get complete frames back.
 * Empty frames (back-to-back END bytes) are skipped. A frame that grows past
 * `maxFrame` bytes is dropped along with everything up to the next END.
 */
export class SlipDecoder {
  private frame: number[] = [];
  private escaping = false;
  private overflowed = false;
  private droppedFrames = 0;

  constructor(private readonly maxFrame: number = MAX_SLIP_FRAME) {}

  /** Oversized frames discarded so far */
  get dropped(): number {
    return this.droppedFrames;
  }

  push(chunk: Buffer): Buffer[] {
    const frames: Buffer[] = [];

    for (const byte of chunk) {
      if (this.overflowed) {
        if (byte === SLIP_END) {
          this.overflowed = false;
        }
        continue;
      }

      if (this.frame.length >= this.maxFrame && byte !== SLIP_END) {
        this.frame = [];
        this.escaping = false;
        this.overflowed = true;
        this.droppedFrames++;
        continue;
      }

      if (this.escaping) {
        this.escaping = false;
        if (byte === SLIP_ESC_END) {
          this.frame.push(SLIP_END);
        } else if (byte === SLIP_ESC_ESC) {
          this.frame.push(SLIP_ESC);
        } else {
          // Protocol violation: keep the byte as-is
          this.frame.push(byte);
        }
        continue;
      }

      if (byte === SLIP_END) {
        if (this.frame.length > 0) {
          frames.push(Buffer.from(this.frame));
          this.frame = [];
        }
      } else if (byte === SLIP_ESC) {
        this.escaping = true;
      } else {
        this.frame.push(byte);
      }
    }

    return frames;
  }

  reset(): void {
    this.frame = [];
    this.escaping = false;
    this.overflowed = false;
  }
}

export type StreamFactory = () => Duplex | Promise<Duplex>;

export interface StreamTransportOptions {
  /** Label used in logs and errors, e.g. `tcp://bridge:7000` */
  peer?: string;

  /**
   * Frames buffered while nobody is receiving
   * @default 256
   */
  maxQueued?: number;
}

/**
 * @example
 * ```typescript
 * // ser2net exposing /dev/ttyUSB0 on port 7000
 * const transport = StreamTransport.tcp('gateway.local', 7000);
 * const engine = new DeliveryEngine(transport);
 * ```
 */
export class StreamTransport implements DatagramTransport {
  private stream: Duplex | null = null;
  private readonly decoder = new SlipDecoder();
  private readonly inbox: DatagramInbox;
  private closing = false;
  readonly peer: string;

  constructor(
    private readonly connect: StreamFactory,
    options: StreamTransportOptions = {}
  ) {
    this.peer = options.peer ?? 'stream';
    this.inbox = new DatagramInbox(options.maxQueued ?? 256);
  }

  /**
   * SLIP over a TCP connection
   */
  static tcp(host: string, port: number, options: Omit<StreamTransportOptions, 'peer'> = {}): StreamTransport {
    return new StreamTransport(
      () =>
        new Promise<Duplex>((resolve, reject) => {
          const socket = net.connect({ host, port });
          const onError = (err: Error) => reject(err);
          socket.once('error', onError);
          socket.once('connect', () => {
            socket.removeListener('error', onError);
            socket.setNoDelay(true);
            resolve(socket);
          });
        }),
      { ...options, peer: `tcp://${host}:${port}` }
    );
  }

  get isOpen(): boolean {
    return this.stream !== null;
  }

  async open(): Promise<void> {
    if (this.stream) return;

    let stream: Duplex;
    try {
      stream = await this.connect();
    } catch (err) {
      throw new TransportUnavailableError(`Cannot open ${this.peer}: ${asError(err).message}`, {
        transport: this.peer,
        code: errorCode(err),
        cause: err,
      });
    }

    this.closing = false;
    this.decoder.reset();
    this.inbox.reset();

    stream.on('data', (chunk: Buffer) => {
      for (const frame of this.decoder.push(chunk)) {
        this.inbox.push(frame);
      }
    });
    stream.on('error', (err: Error) => {
      if (this.closing) return;
      this.inbox.fail(
        new TransportReadError(`${this.peer} failed: ${err.message}`, { code: errorCode(err), cause: err }),
        true
      );
    });
    stream.on('close', () => {
      if (this.closing) return;
      this.stream = null;
      this.inbox.fail(new TransportReadError(`${this.peer} closed by remote`), true);
    });

    this.stream = stream;
  }

  send(data: Buffer): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.destroyed) {
      return Promise.reject(new TransportWriteError(`${this.peer} is not open`));
    }

    return new Promise((resolve, reject) => {
      stream.write(slipEncode(data), (err) => {
        if (err) {
          reject(new TransportWriteError(err.message, { code: errorCode(err), cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs: number): Promise<ReceiveResult> {
    return this.inbox.receive(timeoutMs);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.closing = true;
    this.stream = null;
    this.inbox.close();
    if (!stream || stream.destroyed) return;

    await new Promise<void>((resolve) => {
      stream.once('close', () => resolve());
      stream.destroy();
    });
  }
}
