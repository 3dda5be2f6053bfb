/**
 * Datagram transport capability
 *
 * A link to one fixed remote peer. No ordering or delivery guarantee is
 * assumed; the delivery engine supplies both.
 */

export type ReceiveResult =
  | { kind: 'datagram'; data: Buffer }
  | { kind: 'timeout' };

export const RECEIVE_TIMEOUT: ReceiveResult = Object.freeze({ kind: 'timeout' });

export interface DatagramTransport {
  /**
   * Human-readable description of the remote peer (for logs)
   */
  readonly peer: string;

  /**
   * Acquire the link. Rejects with TransportUnavailableError.
   */
  open(): Promise<void>;

  /**
   * Best-effort send. Rejects with TransportWriteError.
   */
  send(data: Buffer): Promise<void>;

  /**
   * Wait up to `timeoutMs` for one datagram. Resolves `{ kind: 'timeout' }`
   * when nothing arrived; rejects with TransportReadError on link failure.
   */
  receive(timeoutMs: number): Promise<ReceiveResult>;

  /**
   * Release the link. Idempotent.
   */
  close(): Promise<void>;
}
