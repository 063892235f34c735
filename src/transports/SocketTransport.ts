/**
 * Generic client-side transport interface.
 *
 * The transport owns one WebSocket-like connection and reports what happens
 * on it to a single delegate. It does not reconnect on its own; the socket
 * decides when to open a fresh transport.
 */

export type TransportState = 'connecting' | 'open' | 'closing' | 'closed';

/**
 * Receiver of transport events.
 *
 * An error implies the connection is gone; a transport reports either
 * `didError` or `didClose` for one drop, not both.
 */
export interface TransportDelegate {
  didOpen(): void;
  didReceive(text: string): void;
  didError(message: string): void;
  didClose(code: number, reason: string, wasClean: boolean): void;
}

export interface SocketTransport {
  /**
   * Current connection state; `closed` before the first `open()`.
   */
  readonly state: TransportState;

  /**
   * Set the URL used by the next `open()`.
   */
  setURL(url: string): void;

  /**
   * Replace the event receiver. `null` silences further events.
   */
  setDelegate(delegate: TransportDelegate | null): void;

  open(): void;

  close(): void;

  /**
   * Send a text frame.
   *
   * @throws NotConnectedError if the connection is not open
   */
  send(text: string): void;
}
