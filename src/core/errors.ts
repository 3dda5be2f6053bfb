export class CoapError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(message: string, suggestions: string[] = [], retriable = false) {
    super(message);
    this.name = 'CoapError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Error thrown when the underlying link (socket, serial line, bridge) cannot be opened
 */
export class TransportUnavailableError extends CoapError {
  transport: string;
  code?: string;

  constructor(
    message: string,
    options: {
      transport: string;
      code?: string;
      cause?: unknown;
    }
  ) {
    super(
      message,
      [
        'Verify the device path or host/port is correct.',
        'Check that no other process holds the link.',
        'Ensure the radio or serial bridge is powered and reachable.'
      ],
      true
    );
    this.name = 'TransportUnavailableError';
    this.transport = options.transport;
    this.code = options.code;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown when a datagram could not be handed to the link
 */
export class TransportWriteError extends CoapError {
  code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(
      message,
      [
        'The link may be momentarily busy - retry or install a write policy that continues.',
        'Check that the transport is open.',
        'Verify the datagram fits the link MTU.'
      ],
      true
    );
    this.name = 'TransportWriteError';
    this.code = options?.code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown when reading from the link fails for a reason other than a timeout
 */
export class TransportReadError extends CoapError {
  code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(
      message,
      [
        'Check whether the link was closed by the remote side.',
        'Install a read policy returning "continue" for expected transient failures.',
        'Reopen the engine to resume receiving.'
      ],
      true
    );
    this.name = 'TransportReadError';
    this.code = options?.code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown when a message identifier is already held by a live transaction
 */
export class DuplicateMidError extends CoapError {
  mid: number;

  constructor(mid: number) {
    super(
      `Message ID ${mid} is already in use by a live transaction`,
      [
        'Leave mid unset so the engine assigns a fresh one.',
        'Wait for the previous exchange to complete before reusing its MID.'
      ],
      false
    );
    this.name = 'DuplicateMidError';
    this.mid = mid;
  }
}

/**
 * A confirmable message exhausted its retransmissions without an ACK or RST
 */
export class DeliveryTimeoutError extends CoapError {
  mid?: number;
  retransmissions: number;

  constructor(options: { mid?: number; retransmissions: number; path?: string }) {
    const target = options.path ? ` to ${options.path}` : '';
    super(
      `No response${target} after ${options.retransmissions} retransmissions`,
      [
        'Confirm the remote node is powered and in range.',
        'Increase ackTimeout for slow or duty-cycled links.',
        'Check that the remote speaks CoAP on the configured port.'
      ],
      true
    );
    this.name = 'DeliveryTimeoutError';
    this.mid = options.mid;
    this.retransmissions = options.retransmissions;
  }
}

/**
 * The peer answered a confirmable request with RST
 */
export class RequestRejectedError extends CoapError {
  mid?: number;

  constructor(options: { mid?: number; path?: string }) {
    const target = options.path ? ` to ${options.path}` : '';
    super(
      `Request${target} was rejected by the peer (RST)`,
      [
        'The peer could not process the message - check method, path and options.',
        'A sleeping or rebooted node may have lost its state; retry the request.'
      ],
      true
    );
    this.name = 'RequestRejectedError';
    this.mid = options.mid;
  }
}

/**
 * Error thrown when an inbound datagram is not a well-formed message
 */
export class DecodeError extends CoapError {
  position?: number;

  constructor(message: string, options?: { position?: number }) {
    super(
      message,
      [
        'The datagram is probably not CoAP - check what else talks on this link.',
        'Verify the peer uses protocol version 1.'
      ],
      false
    );
    this.name = 'DecodeError';
    this.position = options?.position;
  }
}

/**
 * Error thrown when a state precondition is not met
 */
export class StateError extends CoapError {
  expectedState?: string;
  actualState?: string;

  constructor(
    message: string,
    options?: {
      expectedState?: string;
      actualState?: string;
    }
  ) {
    super(
      message,
      [
        'Ensure open() was awaited before sending.',
        'Create a new engine after close().'
      ],
      false
    );
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends CoapError {
  field?: string;
  value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
    }
  ) {
    super(
      message,
      [
        'Check the input format and constraints.',
        'Ensure required fields are provided.'
      ],
      false
    );
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends CoapError {
  configKey?: string;

  constructor(
    message: string,
    options?: {
      configKey?: string;
    }
  ) {
    super(
      message,
      [
        'Check the COAPLINK_* environment variables.',
        'Verify the configuration values are in the correct format.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function asError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new CoapError(String(value));
}

/**
 * Extract a node-style error code when present
 */
export function errorCode(value: unknown): string | undefined {
  if (value && typeof value === 'object' && 'code' in value) {
    const code = value.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
