/**
 * Client transport using the `ws` package.
 *
 * Holds a single WebSocket and forwards its events to the delegate as raw
 * text. Parsing, routing and reconnecting belong to the socket.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import createDebug from 'debug';
import { NotConnectedError } from '../errors.ts';
import type { SocketTransport, TransportDelegate, TransportState } from './SocketTransport.ts';

const debug = createDebug('phx-socket:ws-transport');

// RFC 6455 normal closure.
const NORMAL_CLOSURE = 1000;

function rawToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export class WsSocketTransport implements SocketTransport {
  private _url: string | null = null;
  private _ws: WebSocket | null = null;
  private _delegate: TransportDelegate | null = null;
  private _closeRequested = false;

  get state(): TransportState {
    if (!this._ws) return 'closed';
    switch (this._ws.readyState) {
      case WebSocket.CONNECTING:
        return 'connecting';
      case WebSocket.OPEN:
        return 'open';
      case WebSocket.CLOSING:
        return 'closing';
      default:
        return 'closed';
    }
  }

  setURL(url: string): void {
    this._url = url;
  }

  setDelegate(delegate: TransportDelegate | null): void {
    this._delegate = delegate;
  }

  open(): void {
    if (!this._url) {
      throw new Error('No URL');
    }
    const url = this._url;

    // Drop any previous connection without reporting its events.
    const previous = this._ws;
    this._ws = null;
    previous?.close();

    this._closeRequested = false;
    debug('Connecting to %s', url);

    const ws = new WebSocket(url);
    this._ws = ws;
    let errored = false;

    ws.on('open', () => {
      if (this._ws !== ws) return;
      debug('Connected to %s', url);
      this._delegate?.didOpen();
    });

    ws.on('message', (data: RawData) => {
      if (this._ws !== ws) return;
      this._delegate?.didReceive(rawToText(data));
    });

    ws.on('error', (err: Error) => {
      if (this._ws !== ws) return;
      debug('WebSocket error on %s: %o', url, err);
      // Aborting a handshake surfaces as an error; report it as the close it is.
      if (this._closeRequested) return;
      errored = true;
      this._delegate?.didError(err.message);
    });

    ws.on('close', (code: number, reason: Buffer) => {
      if (this._ws !== ws) return;
      this._ws = null;
      debug('Disconnected from %s (code: %d)', url, code);
      if (errored) return;
      this._delegate?.didClose(code, reason.toString('utf8'), code === NORMAL_CLOSURE);
    });
  }

  close(): void {
    if (!this._ws) return;
    this._closeRequested = true;
    this._ws.close(NORMAL_CLOSURE);
  }

  send(text: string): void {
    if (!this._ws || this._ws.readyState !== WebSocket.OPEN) {
      throw new NotConnectedError(`Cannot send, transport is ${this.state}`);
    }
    this._ws.send(text);
  }
}
