/**
 * Socket class - the connection controller.
 *
 * Owns one transport at a time, keeps it alive with heartbeats, reconnects
 * after a drop and routes incoming envelopes to channels and observers.
 *
 * Everything that reads or replaces the transport, and every callback the
 * socket invokes, runs as a task on a private `SerialExecutor`. Transport
 * events and timers only submit tasks; they never touch socket state on
 * their own stack.
 */

import createDebug from 'debug';
import { Channel } from './Channel.ts';
import { NotConnectedError, toError } from './errors.ts';
import { endpointUrl, snapshotParams } from './helpers.ts';
import { SerialExecutor } from './SerialExecutor.ts';
import { WsSocketTransport } from './transports/WsSocketTransport.ts';
import type { SocketTransport, TransportDelegate } from './transports/SocketTransport.ts';
import type {
  ChannelOptions,
  CloseCallback,
  ErrorCallback,
  MessageCallback,
  OpenCallback,
  SocketChannel,
  SocketDelegate,
  SocketOptions,
  SocketParams,
  Unsubscribe,
} from './types.ts';
import { ChannelEvent, decodeEnvelope, encodeEnvelope, heartbeatEnvelope } from './wire.ts';
import type { Envelope } from './wire.ts';

const debug = createDebug('phx-socket:socket');

function register<T>(list: T[], item: T): Unsubscribe {
  list.push(item);
  let registered = true;
  return () => {
    if (!registered) return;
    registered = false;
    const index = list.indexOf(item);
    if (index !== -1) list.splice(index, 1);
  };
}

export class Socket {
  private static readonly DEFAULT_HEARTBEAT_INTERVAL_MS = 1000;
  private static readonly DEFAULT_RECONNECT_DELAY_MS = 5000;
  private static readonly DEFAULT_TIMEOUT_MS = 10000;

  private readonly _url: string;
  private readonly _heartbeatIntervalMs: number;
  private readonly _reconnectDelayMs: number;
  private readonly _timeoutMs: number;
  private readonly _createTransport: () => SocketTransport;
  private readonly _onTaskError: (err: Error) => void;
  private readonly _executor: SerialExecutor;

  private _transport: SocketTransport | null = null;
  private _params: SocketParams = {};
  private _ref = 0;

  // Reconnect
  private readonly _reconnectOnError = true;
  private _canReconnect = false;
  private _reconnecting = false;
  private _reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  // Heartbeat
  private _canSendHeartbeat = false;
  private _heartbeatTimer: ReturnType<typeof setTimeout> | null = null;

  // Registries
  private _channels: SocketChannel[] = [];
  private _openCallbacks: OpenCallback[] = [];
  private _closeCallbacks: CloseCallback[] = [];
  private _errorCallbacks: ErrorCallback[] = [];
  private _messageCallbacks: MessageCallback[] = [];
  private _delegate: WeakRef<SocketDelegate> | null = null;

  /**
   * @param url - WebSocket endpoint, e.g. "ws://localhost:4000/socket/websocket"
   */
  constructor(url: string, options: SocketOptions = {}) {
    this._url = url;
    this._heartbeatIntervalMs = options.heartbeatIntervalMs ?? Socket.DEFAULT_HEARTBEAT_INTERVAL_MS;
    this._reconnectDelayMs = options.reconnectDelayMs ?? Socket.DEFAULT_RECONNECT_DELAY_MS;
    this._timeoutMs = options.timeoutMs ?? Socket.DEFAULT_TIMEOUT_MS;
    this._createTransport = options.createTransport ?? (() => new WsSocketTransport());
    this._onTaskError = options.onTaskError ?? ((err) => debug('Task failed: %o', err));
    this._executor = new SerialExecutor((err) => this._onTaskError(err));
  }

  /**
   * The endpoint URL, without params.
   */
  get url(): string {
    return this._url;
  }

  /**
   * Params used by the last connect, reused on reconnect.
   */
  get params(): Readonly<SocketParams> {
    return this._params;
  }

  /**
   * Registered channels, in registration order.
   */
  get channels(): readonly SocketChannel[] {
    return [...this._channels];
  }

  /**
   * Open the connection.
   *
   * Params are remembered for reconnects. Connecting while a transport is
   * already connecting or open only updates the params.
   *
   * @returns Promise resolving once the open has been issued
   */
  connect(params: SocketParams = {}): Promise<void> {
    const snapshot = snapshotParams(params);
    return this._executor.run(() => this._connect(snapshot));
  }

  /**
   * Close the connection and cancel heartbeats and any pending reconnect.
   */
  disconnect(): Promise<void> {
    return this._executor.run(() => this._disconnect());
  }

  /**
   * Replace the transport with a fresh one, using the last params.
   */
  reconnect(): Promise<void> {
    return this._executor.run(() => this._reconnect());
  }

  /**
   * Resolve once every queued task (transport events, heartbeats,
   * reconnects) has run.
   */
  idle(): Promise<void> {
    return this._executor.idle();
  }

  isConnected(): boolean {
    return this._transport?.state === 'open';
  }

  /**
   * Encode and send an envelope.
   *
   * @throws NotConnectedError if there is no open transport
   */
  push(envelope: Envelope): void {
    const transport = this._transport;
    if (!transport || transport.state !== 'open') {
      throw new NotConnectedError(
        `Cannot push ${envelope.event} to ${envelope.topic}, socket is not connected`
      );
    }
    transport.send(encodeEnvelope(envelope));
  }

  /**
   * Mint a ref. Values start at 0 and never repeat.
   */
  makeRef(): number {
    return this._ref++;
  }

  onOpen(callback: OpenCallback): Unsubscribe {
    return register(this._openCallbacks, callback);
  }

  onClose(callback: CloseCallback): Unsubscribe {
    return register(this._closeCallbacks, callback);
  }

  onError(callback: ErrorCallback): Unsubscribe {
    return register(this._errorCallbacks, callback);
  }

  onMessage(callback: MessageCallback): Unsubscribe {
    return register(this._messageCallbacks, callback);
  }

  addChannel(channel: SocketChannel): void {
    this._channels.push(channel);
  }

  /**
   * Unregister a channel by identity.
   *
   * @returns Whether the channel was registered
   */
  removeChannel(channel: SocketChannel): boolean {
    const index = this._channels.indexOf(channel);
    if (index === -1) return false;
    this._channels.splice(index, 1);
    return true;
  }

  /**
   * Create and register a channel for a topic.
   *
   * @example
   * ```typescript
   * const room = socket.channel('room:lobby', { token: 'test-token' });
   * room.on('new_msg', (payload) => console.log(payload));
   * await room.join();
   * ```
   */
  channel(topic: string, params: Record<string, unknown> = {}, options: ChannelOptions = {}): Channel {
    const channel = new Channel(this, topic, params, {
      timeoutMs: options.timeoutMs ?? this._timeoutMs,
    });
    this.addChannel(channel);
    return channel;
  }

  /**
   * Set the lifecycle observer. The socket does not keep it alive.
   */
  setDelegate(delegate: SocketDelegate | null): void {
    this._delegate = delegate ? new WeakRef(delegate) : null;
  }

  // Serialized context: everything below runs inside executor tasks.

  private _connect(params: SocketParams): void {
    this._params = params;
    this._discardReconnectTimer();

    const current = this._transport;
    if (current && (current.state === 'connecting' || current.state === 'open')) {
      debug('Already %s, not opening again', current.state);
      return;
    }

    const transport = current ?? this._createTransport();
    this._transport = transport;
    transport.setDelegate(this._delegateFor(transport));
    transport.setURL(endpointUrl(this._url, params));
    debug('Connecting to %s', this._url);
    transport.open();
  }

  /**
   * Events from a transport that has since been released are dropped when
   * their task runs, so a late close cannot revive a disconnected socket.
   */
  private _delegateFor(transport: SocketTransport): TransportDelegate {
    const submit = (task: () => void) => {
      this._executor.enqueue(() => {
        if (this._transport !== transport) {
          debug('Dropping event from released transport');
          return;
        }
        task();
      });
    };

    return {
      didOpen: () => submit(() => this._onConnOpen()),
      didReceive: (text) => submit(() => this._onConnMessage(text)),
      didError: (message) => submit(() => this._onConnError(message)),
      didClose: (code, reason, wasClean) => {
        debug('Transport closed (code: %d, clean: %s)', code, wasClean);
        submit(() => this._onConnClose(reason));
      },
    };
  }

  private _disconnect(): void {
    debug('Disconnecting from %s', this._url);
    this._discardHeartbeatTimer();
    this._discardReconnectTimer();
    this._disconnectTransport();
  }

  private _reconnect(): void {
    this._discardHeartbeatTimer();
    this._disconnectTransport();
    this._connect(this._params);
  }

  private _disconnectTransport(): void {
    const transport = this._transport;
    if (!transport) return;
    this._transport = null;
    transport.setDelegate(null);
    transport.close();
  }

  private _onConnOpen(): void {
    debug('Connected to %s', this._url);
    this._discardReconnectTimer();

    if (this._heartbeatIntervalMs > 0) {
      this._startHeartbeat();
    }

    for (const callback of [...this._openCallbacks]) {
      this._safely(() => callback());
    }
    const delegate = this._delegate?.deref();
    if (delegate) this._safely(() => delegate.socketDidOpen?.());
  }

  private _onConnClose(reason: string): void {
    debug('Connection lost: %s', reason);
    this._triggerChanError(reason);

    if (this._reconnectOnError && !this._reconnecting) {
      this._scheduleReconnect();
    }

    this._discardHeartbeatTimer();

    for (const callback of [...this._closeCallbacks]) {
      this._safely(() => callback(reason));
    }
    const delegate = this._delegate?.deref();
    if (delegate) this._safely(() => delegate.socketDidClose?.(reason));
  }

  private _onConnError(message: string): void {
    debug('Transport error: %s', message);
    this._discardHeartbeatTimer();

    for (const callback of [...this._errorCallbacks]) {
      this._safely(() => callback(message));
    }
    const delegate = this._delegate?.deref();
    if (delegate) this._safely(() => delegate.socketDidReceiveError?.(message));

    this._onConnClose(message);
  }

  private _onConnMessage(text: string): void {
    // Throws MalformedEnvelopeError; the executor isolates this task.
    const envelope = decodeEnvelope(text);

    for (const channel of [...this._channels]) {
      if (channel.topic === envelope.topic) {
        this._safely(() => channel.triggerEvent(envelope.event, envelope.payload, envelope.ref));
      }
    }

    for (const callback of [...this._messageCallbacks]) {
      this._safely(() => callback(envelope));
    }
  }

  private _triggerChanError(reason: string): void {
    for (const channel of [...this._channels]) {
      this._safely(() => channel.triggerEvent(ChannelEvent.ERROR, reason, 0));
    }
  }

  private _startHeartbeat(): void {
    this._discardHeartbeatTimer();
    this._canSendHeartbeat = true;

    const schedule = () => {
      this._heartbeatTimer = setTimeout(() => {
        this._heartbeatTimer = null;
        if (!this._canSendHeartbeat) return;
        this._executor.enqueue(() => this._sendHeartbeat());
        schedule();
      }, this._heartbeatIntervalMs);
    };
    schedule();
  }

  private _sendHeartbeat(): void {
    if (!this._canSendHeartbeat || !this.isConnected()) {
      debug('Skipping heartbeat, socket not connected');
      return;
    }
    const envelope = heartbeatEnvelope(this.makeRef());
    debug('Sending heartbeat (ref: %d)', envelope.ref);
    this.push(envelope);
  }

  private _discardHeartbeatTimer(): void {
    this._canSendHeartbeat = false;
    if (this._heartbeatTimer) {
      clearTimeout(this._heartbeatTimer);
      this._heartbeatTimer = null;
    }
  }

  private _scheduleReconnect(): void {
    this._reconnecting = true;
    this._canReconnect = true;
    debug('Reconnecting in %dms', this._reconnectDelayMs);

    this._reconnectTimer = setTimeout(() => {
      this._reconnectTimer = null;
      this._executor.enqueue(() => {
        try {
          if (this._canReconnect) {
            this._canReconnect = false;
            this._reconnect();
          }
        } finally {
          this._reconnecting = false;
        }
      });
    }, this._reconnectDelayMs);
  }

  private _discardReconnectTimer(): void {
    this._canReconnect = false;
    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
      this._reconnecting = false;
    }
  }

  private _safely(fn: () => unknown): void {
    try {
      const result = fn();
      // Callbacks typed as returning void may still be async.
      if (result instanceof Promise) {
        result.catch((err: unknown) => this._onTaskError(toError(err)));
      }
    } catch (err) {
      this._onTaskError(toError(err));
    }
  }
}
