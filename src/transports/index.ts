/**
 * Transport layer exports.
 */

export type { SocketTransport, TransportDelegate, TransportState } from './SocketTransport.ts';

export { WsSocketTransport } from './WsSocketTransport.ts';
