/**
 * Protocol constants for coaplink
 * Transmission parameters and registry numbers from RFC 7252, RFC 7641 and RFC 7967
 */

// Transmission parameters (RFC 7252 §4.8)
export const ACK_TIMEOUT_MS = 2000;
export const ACK_RANDOM_FACTOR = 1.5;
export const MAX_RETRANSMIT = 4;
export const EXCHANGE_LIFETIME_MS = 247000;

// Receiver loop
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_PURGE_INTERVAL_MS = 30000;

// Message identifiers wrap modulo 2^16
export const MID_SPACE = 0x10000;

export const COAP_VERSION = 1;
export const PAYLOAD_MARKER = 0xff;
export const MAX_TOKEN_LENGTH = 8;
export const DEFAULT_TOKEN_LENGTH = 4;

// Message types (2-bit field)
export const MessageTypes = {
  CON: 0,
  NON: 1,
  ACK: 2,
  RST: 3,
} as const;

export type MessageType = keyof typeof MessageTypes;

export const MESSAGE_TYPE_NAMES: readonly MessageType[] = ['CON', 'NON', 'ACK', 'RST'];

// Request method codes (class 0)
export const Methods = {
  GET: 1,
  POST: 2,
  PUT: 3,
  DELETE: 4,
} as const;

export type Method = keyof typeof Methods;

export const EMPTY_CODE = 0;

// Option numbers used by the engine and its collaborators
export const OptionNumbers = {
  OBSERVE: 6,
  URI_PATH: 11,
  CONTENT_FORMAT: 12,
  URI_QUERY: 15,
  ACCEPT: 17,
  BLOCK2: 23,
  BLOCK1: 27,
  NO_RESPONSE: 258,
} as const;

// No-Response value suppressing 2.xx, 4.xx and 5.xx (RFC 7967 §2.1)
export const NO_RESPONSE_SUPPRESS_ALL = 26;

// Observe registration values (RFC 7641 §2)
export const OBSERVE_REGISTER = 0;
export const OBSERVE_DEREGISTER = 1;

export const WELL_KNOWN_CORE = '/.well-known/core';

// Content-Format identifiers
export const ContentFormats = {
  TEXT_PLAIN: 0,
  LINK_FORMAT: 40,
  JSON: 50,
} as const;

// Response codes (class << 5 | detail)
export const ResponseCodes = {
  CREATED: 65, // 2.01
  DELETED: 66, // 2.02
  VALID: 67, // 2.03
  CHANGED: 68, // 2.04
  CONTENT: 69, // 2.05
  BAD_REQUEST: 128, // 4.00
  NOT_FOUND: 132, // 4.04
  METHOD_NOT_ALLOWED: 133, // 4.05
  INTERNAL_SERVER_ERROR: 160, // 5.00
} as const;
