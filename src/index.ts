/**
 * coaplink
 *
 * Reliable CoAP request/response delivery over unreliable datagram links.
 *
 * @example
 * ```typescript
 * import { CoapClient } from 'coaplink';
 *
 * const client = CoapClient.connect('udp://10.0.0.7:5683');
 * await client.open();
 * const response = await client.get('/sensors/temp');
 * await client.close();
 * ```
 */

export * from './constants.js';
export * from './core/errors.js';
export * from './types/index.js';
export { consoleLogger, silentLogger, createLevelLogger, type LogLevel } from './types/logger.js';
export { ConsoleLogger, detectLogLevel, getLogger, setLogger, type ConsoleLoggerOptions, type ConsoleLogLevel } from './utils/logger.js';

export {
  engineConfigSchema,
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  parseMid,
  loadConfigFromEnv,
  type EngineConfig,
} from './config.js';

export {
  Message,
  Request,
  Response,
  codeToString,
  makeCode,
  encodeUint,
  decodeUint,
  type CoapOption,
  type OptionValue,
  type MessageInit,
  type RequestInit,
} from './core/message.js';
export { CoapCodec } from './codec/coap-codec.js';
export { Transaction } from './core/transaction.js';
export { TransactionTable } from './core/transaction-table.js';
export { EngineState } from './core/state.js';
export { RetransmissionScheduler } from './core/retransmission.js';
export { ReceiverLoop, type ReceiverHost } from './core/receiver.js';
export { DeliveryEngine } from './core/engine.js';
export {
  CoapClient,
  type CoapClientOptions,
  type RequestOptions,
  type Observation,
  type NotificationHandler,
} from './core/client.js';

export { PassthroughBlockLayer } from './layers/block.js';
export { SubscriptionRegistry } from './layers/observe.js';

export { RECEIVE_TIMEOUT } from './types/transport.js';
export { UdpTransport, DEFAULT_COAP_PORT, type UdpTransportOptions } from './transport/udp.js';
export {
  StreamTransport,
  SlipDecoder,
  slipEncode,
  type StreamFactory,
  type StreamTransportOptions,
} from './transport/stream.js';
export { parseTarget, createTransport, type TransportTarget } from './transport/target.js';
