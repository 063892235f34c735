/**
 * phx-socket: client for Phoenix-style channels over a single WebSocket.
 *
 * ## Public API
 * - `Socket`: connection controller (heartbeats, reconnects, routing)
 * - `Channel`: one topic on the socket (join, push, leave)
 * - `WsSocketTransport`: default transport on the `ws` package
 * - `SerialExecutor`: the FIFO queue every socket runs its work on
 *
 * ## Example
 * ```ts
 * import { Socket } from 'phx-socket';
 *
 * const socket = new Socket('ws://localhost:4000/socket/websocket', {
 *   heartbeatIntervalMs: 30000,
 * });
 * socket.onError((error) => console.error('socket error', error));
 * await socket.connect({ token: 'test-token' });
 *
 * const room = socket.channel('room:lobby');
 * room.on('new_msg', (payload) => console.log(payload));
 * await room.join();
 * await room.push('new_msg', { body: 'hi' });
 * ```
 *
 * @packageDocumentation
 */

// Runtime exports
export { Socket } from './Socket.ts';
export { Channel } from './Channel.ts';
export { SerialExecutor } from './SerialExecutor.ts';
export { WsSocketTransport } from './transports/WsSocketTransport.ts';
export {
  ChannelEvent,
  PHOENIX_TOPIC,
  decodeEnvelope,
  encodeEnvelope,
  heartbeatEnvelope,
} from './wire.ts';
export { endpointUrl } from './helpers.ts';
export {
  ErrorCode,
  NotConnectedError,
  MalformedEnvelopeError,
  TimeoutError,
  ConnectionError,
  ReplyError,
  ChannelStateError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';

// Type-only exports
export type {
  SocketParams,
  SocketChannel,
  SocketDelegate,
  SocketOptions,
  ChannelOptions,
  OpenCallback,
  CloseCallback,
  ErrorCallback,
  MessageCallback,
  Unsubscribe,
} from './types.ts';

export type { Envelope, ReplyPayload } from './wire.ts';
export type { ChannelState } from './Channel.ts';
export type { Task } from './SerialExecutor.ts';
export type { ErrorCodeType } from './errors.ts';
export type { SocketTransport, TransportDelegate, TransportState } from './transports/index.ts';
