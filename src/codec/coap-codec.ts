/**
 * CoAP binary codec (RFC 7252 §3)
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |Ver| T |  TKL  |      Code     |          Message ID           |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |   Token (if any, TKL bytes) ...
 *  |   Options (if any) ...
 *  |1 1 1 1 1 1 1 1|    Payload (if any) ...
 */

import {
  COAP_VERSION,
  MAX_TOKEN_LENGTH,
  MESSAGE_TYPE_NAMES,
  MessageTypes,
  PAYLOAD_MARKER,
} from '../constants.js';
import { DecodeError, ValidationError } from '../core/errors.js';
import {
  Message,
  Request,
  Response,
  isRequestCode,
  isResponseCode,
  type CoapOption,
} from '../core/message.js';
import type { Codec } from '../types/index.js';

const HEADER_LENGTH = 4;

export class CoapCodec implements Codec {
  encode(message: Message): Buffer {
    if (message.mid === undefined) {
      throw new ValidationError('Cannot encode a message without a MID', { field: 'mid' });
    }
    if (!Number.isInteger(message.mid) || message.mid < 0 || message.mid > 0xffff) {
      throw new ValidationError(`MID out of range: ${message.mid}`, { field: 'mid', value: message.mid });
    }
    if (message.token.length > MAX_TOKEN_LENGTH) {
      throw new ValidationError(`Token longer than ${MAX_TOKEN_LENGTH} bytes`, {
        field: 'token',
        value: message.token.length,
      });
    }

    const header = Buffer.alloc(HEADER_LENGTH);
    header[0] = (COAP_VERSION << 6) | (MessageTypes[message.type] << 4) | message.token.length;
    header[1] = message.code;
    header.writeUInt16BE(message.mid, 2);

    const parts: Buffer[] = [header, message.token];
    let previous = 0;
    for (const option of message.options) {
      parts.push(encodeOption(option, option.number - previous));
      previous = option.number;
    }

    if (message.payload.length > 0) {
      parts.push(Buffer.from([PAYLOAD_MARKER]), message.payload);
    }

    return Buffer.concat(parts);
  }

  decode(data: Buffer): Message {
    if (data.length < HEADER_LENGTH) {
      throw new DecodeError(`Datagram too short: ${data.length} bytes`, { position: 0 });
    }

    const version = data[0] >> 6;
    if (version !== COAP_VERSION) {
      throw new DecodeError(`Unsupported CoAP version ${version}`, { position: 0 });
    }

    const type = MESSAGE_TYPE_NAMES[(data[0] >> 4) & 0x03];
    const tokenLength = data[0] & 0x0f;
    if (tokenLength > MAX_TOKEN_LENGTH) {
      throw new DecodeError(`Reserved token length ${tokenLength}`, { position: 0 });
    }

    const code = data[1];
    const mid = data.readUInt16BE(2);

    if (data.length < HEADER_LENGTH + tokenLength) {
      throw new DecodeError('Datagram truncated inside token', { position: HEADER_LENGTH });
    }
    const token = Buffer.from(data.subarray(HEADER_LENGTH, HEADER_LENGTH + tokenLength));

    const options: CoapOption[] = [];
    let offset = HEADER_LENGTH + tokenLength;
    let number = 0;
    let payload = Buffer.alloc(0);

    while (offset < data.length) {
      const byte = data[offset];
      if (byte === PAYLOAD_MARKER) {
        if (offset + 1 >= data.length) {
          throw new DecodeError('Payload marker followed by empty payload', { position: offset });
        }
        payload = Buffer.from(data.subarray(offset + 1));
        break;
      }
      offset++;

      const delta = readExtended(data, byte >> 4, offset);
      offset = delta.offset;
      const length = readExtended(data, byte & 0x0f, offset);
      offset = length.offset;

      if (offset + length.value > data.length) {
        throw new DecodeError('Option value exceeds datagram', { position: offset });
      }
      number += delta.value;
      options.push({ number, value: Buffer.from(data.subarray(offset, offset + length.value)) });
      offset += length.value;
    }

    if (code === 0) {
      if (tokenLength > 0 || options.length > 0 || payload.length > 0) {
        throw new DecodeError('Empty message must not carry token, options or payload', { position: 0 });
      }
      return new Message({ type, mid, code });
    }

    const init = { type, mid, code, token, options, payload };
    if (isRequestCode(code)) {
      const request = new Request({ type, mid, token, options, payload });
      request.code = code;
      return request;
    }
    if (isResponseCode(code)) {
      return new Response(init);
    }
    throw new DecodeError(`Reserved code class ${code >> 5}`, { position: 1 });
  }
}

function encodeOption(option: CoapOption, delta: number): Buffer {
  const deltaField = nibble(delta);
  const lengthField = nibble(option.value.length);
  return Buffer.concat([
    Buffer.from([(deltaField.nibble << 4) | lengthField.nibble]),
    deltaField.extended,
    lengthField.extended,
    option.value,
  ]);
}

function nibble(value: number): { nibble: number; extended: Buffer } {
  if (value < 13) {
    return { nibble: value, extended: Buffer.alloc(0) };
  }
  if (value < 269) {
    return { nibble: 13, extended: Buffer.from([value - 13]) };
  }
  if (value < 65805) {
    const extended = Buffer.alloc(2);
    extended.writeUInt16BE(value - 269, 0);
    return { nibble: 14, extended };
  }
  throw new ValidationError(`Option delta/length too large: ${value}`, { field: 'options', value });
}

function readExtended(data: Buffer, field: number, offset: number): { value: number; offset: number } {
  switch (field) {
    case 13:
      if (offset + 1 > data.length) {
        throw new DecodeError('Truncated option header', { position: offset });
      }
      return { value: data[offset] + 13, offset: offset + 1 };
    case 14:
      if (offset + 2 > data.length) {
        throw new DecodeError('Truncated option header', { position: offset });
      }
      return { value: data.readUInt16BE(offset) + 269, offset: offset + 2 };
    case 15:
      throw new DecodeError('Reserved option nibble 15', { position: offset - 1 });
    default:
      return { value: field, offset };
  }
}
