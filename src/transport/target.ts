import { ValidationError } from '../core/errors.js';
import type { DatagramTransport } from '../types/transport.js';
import { StreamTransport } from './stream.js';
import { DEFAULT_COAP_PORT, UdpTransport } from './udp.js';

export interface TransportTarget {
  scheme: 'udp' | 'tcp';
  host: string;
  port: number;
}

/**
 * Parse `udp://host[:port]` or `tcp://host:port`
 *
 * A bare `host[:port]` is taken as UDP.
 */
export function parseTarget(target: string): TransportTarget {
  const withScheme = target.includes('://') ? target : `udp://${target}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new ValidationError(`Invalid target: ${target}`, { field: 'target', value: target });
  }

  const scheme = url.protocol.replace(/:$/, '');
  if (scheme !== 'udp' && scheme !== 'tcp') {
    throw new ValidationError(`Unsupported target scheme "${scheme}" (expected udp or tcp)`, {
      field: 'target',
      value: target,
    });
  }

  // IPv6 literals keep their brackets in URL.hostname
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  if (!host) {
    throw new ValidationError(`Target has no host: ${target}`, { field: 'target', value: target });
  }

  if (url.port === '' && scheme === 'tcp') {
    throw new ValidationError(`TCP target needs a port: ${target}`, { field: 'target', value: target });
  }
  const port = url.port === '' ? DEFAULT_COAP_PORT : Number(url.port);

  return { scheme, host, port };
}

/**
 * Build the transport a target string names
 */
export function createTransport(target: string | TransportTarget): DatagramTransport {
  const parsed = typeof target === 'string' ? parseTarget(target) : target;
  if (parsed.scheme === 'tcp') {
    return StreamTransport.tcp(parsed.host, parsed.port);
  }
  return new UdpTransport({
    host: parsed.host,
    port: parsed.port,
    type: parsed.host.includes(':') ? 'udp6' : 'udp4',
  });
}
