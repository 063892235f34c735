/**
 * Core type definitions for the socket client.
 */

import type { Envelope } from './wire.ts';
import type { SocketTransport } from './transports/SocketTransport.ts';

/**
 * Connection params, appended to the endpoint URL as query parameters.
 */
export type SocketParams = Record<string, string>;

/**
 * What the socket needs from a channel: its topic and a way to deliver
 * routed events. `ref` is `null` when the frame carried none.
 */
export interface SocketChannel {
  readonly topic: string;
  triggerEvent(event: string, payload: unknown, ref: number | null): void;
}

/**
 * Observer of socket lifecycle events. Held weakly by the socket, so it must
 * be kept alive by its owner.
 */
export interface SocketDelegate {
  socketDidOpen?(): void;
  socketDidClose?(reason: string): void;
  socketDidReceiveError?(error: string): void;
}

export type OpenCallback = () => void;
export type CloseCallback = (reason: string) => void;
export type ErrorCallback = (error: string) => void;
export type MessageCallback = (envelope: Envelope) => void;

/**
 * Removes a registered callback.
 */
export type Unsubscribe = () => void;

/**
 * Socket configuration options.
 */
export interface SocketOptions {
  /** Heartbeat interval in milliseconds. 0 disables heartbeats. Default: 1000 */
  heartbeatIntervalMs?: number;
  /** Delay before reconnecting after a drop, in milliseconds. Default: 5000 */
  reconnectDelayMs?: number;
  /** Default reply timeout for channel pushes, in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /**
   * Build the transport for each connection.
   * Default: `ws` transport.
   */
  createTransport?: () => SocketTransport;
  /**
   * Receives errors thrown while processing transport events or callbacks.
   * Default: logged under `phx-socket:executor`.
   */
  onTaskError?: (err: Error) => void;
}

/**
 * Channel configuration options.
 */
export interface ChannelOptions {
  /** Default reply timeout for pushes, in milliseconds. Default: 10000 */
  timeoutMs?: number;
}
