import {
  EMPTY_CODE,
  Methods,
  OptionNumbers,
  NO_RESPONSE_SUPPRESS_ALL,
  type Method,
  type MessageType,
} from '../constants.js';

export interface CoapOption {
  number: number;
  value: Buffer;
}

export type OptionValue = Buffer | string | number;

export interface MessageInit {
  type?: MessageType;
  mid?: number;
  code?: number;
  token?: Buffer;
  options?: CoapOption[];
  payload?: Buffer | string;
}

/**
 * A CoAP message. The delivery flags are mutated by the engine
 * as the outcome of a confirmable exchange becomes known.
 */
export class Message {
  type: MessageType;
  mid?: number;
  code: number;
  token: Buffer;
  options: CoapOption[];
  payload: Buffer;

  acknowledged = false;
  rejected = false;
  timedOut = false;

  constructor(init: MessageInit = {}) {
    this.type = init.type ?? 'CON';
    this.mid = init.mid;
    this.code = init.code ?? EMPTY_CODE;
    this.token = init.token ?? Buffer.alloc(0);
    this.options = sortOptions(init.options ?? []);
    this.payload = typeof init.payload === 'string'
      ? Buffer.from(init.payload)
      : init.payload ?? Buffer.alloc(0);
  }

  /**
   * Empty messages (code 0.00) carry only type and MID: ACK, RST or CoAP ping.
   */
  get isEmpty(): boolean {
    return this.code === EMPTY_CODE;
  }

  getOption(number: number): CoapOption | undefined {
    return this.options.find((opt) => opt.number === number);
  }

  getOptions(number: number): CoapOption[] {
    return this.options.filter((opt) => opt.number === number);
  }

  /**
   * Append an option, keeping the list ordered by option number.
   * Repeated options keep their insertion order.
   */
  addOption(number: number, value: OptionValue): this {
    this.options = sortOptions([...this.options, { number, value: toOptionBuffer(value) }]);
    return this;
  }

  setOption(number: number, value: OptionValue): this {
    this.removeOption(number);
    return this.addOption(number, value);
  }

  removeOption(number: number): this {
    this.options = this.options.filter((opt) => opt.number !== number);
    return this;
  }

  get observe(): number | undefined {
    const opt = this.getOption(OptionNumbers.OBSERVE);
    return opt ? decodeUint(opt.value) : undefined;
  }

  set observe(value: number | undefined) {
    if (value === undefined) {
      this.removeOption(OptionNumbers.OBSERVE);
    } else {
      this.setOption(OptionNumbers.OBSERVE, value);
    }
  }

  /**
   * True when a No-Response option asks the peer to suppress every response class
   */
  get suppressesResponse(): boolean {
    const opt = this.getOption(OptionNumbers.NO_RESPONSE);
    return opt !== undefined && decodeUint(opt.value) === NO_RESPONSE_SUPPRESS_ALL;
  }

  get tokenHex(): string {
    return this.token.toString('hex');
  }

  /**
   * One-line description for logs
   */
  describe(): string {
    const mid = this.mid === undefined ? '-' : String(this.mid);
    const token = this.token.length > 0 ? this.tokenHex : '-';
    const code = this.isEmpty ? 'EMPTY' : codeToString(this.code);
    return `${this.type} MID=${mid} Token=${token} Code=${code} Payload=${this.payload.length}B`;
  }
}

export interface RequestInit extends Omit<MessageInit, 'code'> {
  method?: Method;
  path?: string;
  query?: string[];
}

export class Request extends Message {
  constructor(init: RequestInit = {}) {
    super({ ...init, code: Methods[init.method ?? 'GET'] });
    if (init.path !== undefined) {
      this.path = init.path;
    }
    for (const query of init.query ?? []) {
      this.addOption(OptionNumbers.URI_QUERY, query);
    }
  }

  get method(): Method | undefined {
    const entry = Object.entries(Methods).find(([, code]) => code === this.code);
    return entry ? methodFromName(entry[0]) : undefined;
  }

  /**
   * Uri-Path options joined with `/`
   */
  get path(): string {
    const segments = this.getOptions(OptionNumbers.URI_PATH).map((opt) => opt.value.toString('utf8'));
    return '/' + segments.join('/');
  }

  set path(value: string) {
    this.removeOption(OptionNumbers.URI_PATH);
    for (const segment of value.split('/')) {
      if (segment.length > 0) {
        this.addOption(OptionNumbers.URI_PATH, segment);
      }
    }
  }
}

export class Response extends Message {
  get codeClass(): number {
    return this.code >> 5;
  }

  get isSuccess(): boolean {
    return this.codeClass === 2;
  }

  get text(): string {
    return this.payload.toString('utf8');
  }
}

/**
 * Render a code as `class.detail`, e.g. 69 -> "2.05"
 */
export function codeToString(code: number): string {
  const detail = code & 0x1f;
  return `${code >> 5}.${detail.toString().padStart(2, '0')}`;
}

/**
 * Build a code from `class.detail` parts
 */
export function makeCode(codeClass: number, detail: number): number {
  return ((codeClass & 0x07) << 5) | (detail & 0x1f);
}

export function isRequestCode(code: number): boolean {
  return code !== EMPTY_CODE && code >> 5 === 0;
}

export function isResponseCode(code: number): boolean {
  const codeClass = code >> 5;
  return codeClass >= 2 && codeClass <= 5;
}

/**
 * Minimal-length big-endian unsigned integer (RFC 7252 §3.2 "uint")
 */
export function encodeUint(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new RangeError(`Option uint out of range: ${value}`);
  }
  const bytes: number[] = [];
  let rest = value;
  while (rest > 0) {
    bytes.unshift(rest & 0xff);
    rest = Math.floor(rest / 256);
  }
  return Buffer.from(bytes);
}

export function decodeUint(buffer: Buffer): number {
  let value = 0;
  for (const byte of buffer) {
    value = value * 256 + byte;
  }
  return value;
}

function toOptionBuffer(value: OptionValue): Buffer {
  if (typeof value === 'number') return encodeUint(value);
  if (typeof value === 'string') return Buffer.from(value, 'utf8');
  return value;
}

function sortOptions(options: CoapOption[]): CoapOption[] {
  // Array.prototype.sort is stable, so repeated options keep their order
  return [...options].sort((a, b) => a.number - b.number);
}

function methodFromName(name: string): Method | undefined {
  switch (name) {
    case 'GET':
    case 'POST':
    case 'PUT':
    case 'DELETE':
      return name;
    default:
      return undefined;
  }
}
