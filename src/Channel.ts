/**
 * Client-side channel implementation.
 *
 * A channel is one topic multiplexed over the socket. It joins with
 * `phx_join`, correlates `phx_reply` frames with its pushes by ref, and
 * re-emits every routed event as `(payload, ref)`.
 */

import createDebug from 'debug';
import { EventEmitter } from 'events';
import {
  ChannelStateError,
  ConnectionError,
  MalformedEnvelopeError,
  ReplyError,
  TimeoutError,
  toError,
} from './errors.ts';
import type { ChannelOptions, SocketChannel, Unsubscribe } from './types.ts';
import { ChannelEvent, parseReply } from './wire.ts';
import type { Socket } from './Socket.ts';

const debug = createDebug('phx-socket:channel');

export type ChannelState = 'closed' | 'joining' | 'joined' | 'leaving' | 'errored';

interface PendingPush {
  event: string;
  resolve: (response: unknown) => void;
  reject: (err: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

interface JoinWaiter {
  resolve: (response: unknown) => void;
  reject: (err: Error) => void;
}

export class Channel extends EventEmitter implements SocketChannel {
  private static readonly DEFAULT_TIMEOUT_MS = 10000;

  private _socket: Socket;
  private _topic: string;
  private _params: Record<string, unknown>;
  private _timeoutMs: number;
  private _joinTimeoutMs: number;
  private _state: ChannelState = 'closed';

  private _joinedOnce = false;
  private _joinInFlight = false;
  private _joinWaiter: JoinWaiter | null = null;
  private _pending = new Map<number, PendingPush>();
  private _removeOpenListener: Unsubscribe | null;

  constructor(
    socket: Socket,
    topic: string,
    params: Record<string, unknown> = {},
    options: ChannelOptions = {}
  ) {
    super();
    this._socket = socket;
    this._topic = topic;
    this._params = params;
    this._timeoutMs = options.timeoutMs ?? Channel.DEFAULT_TIMEOUT_MS;
    this._joinTimeoutMs = this._timeoutMs;

    this._removeOpenListener = this._socket.onOpen(() => this._rejoin());
  }

  get topic(): string {
    return this._topic;
  }

  get state(): ChannelState {
    return this._state;
  }

  /**
   * Join the topic. Sent now if the socket is connected, otherwise on the
   * next socket open. A channel joins at most once; after a drop it rejoins
   * on its own.
   *
   * @returns Promise resolving with the join reply's response
   */
  join(timeoutMs = this._timeoutMs): Promise<unknown> {
    if (this._joinedOnce) {
      return Promise.reject(
        new ChannelStateError(`Tried to join ${this._topic} multiple times`)
      );
    }
    this._joinedOnce = true;
    this._joinTimeoutMs = timeoutMs;

    return new Promise((resolve, reject) => {
      this._joinWaiter = { resolve, reject };
      this._sendJoin();
    });
  }

  /**
   * Push an event and wait for its reply.
   *
   * @returns Promise resolving with the reply's response when its status is `ok`
   */
  push(event: string, payload: unknown, timeoutMs = this._timeoutMs): Promise<unknown> {
    if (!this._joinedOnce) {
      return Promise.reject(
        new ChannelStateError(`Tried to push ${event} to ${this._topic} before joining`)
      );
    }
    return this._push(event, payload, timeoutMs);
  }

  /**
   * Leave the topic. The channel is closed and unregistered once the server
   * replies or the timeout passes.
   */
  async leave(timeoutMs = this._timeoutMs): Promise<void> {
    this._state = 'leaving';

    const waiter = this._joinWaiter;
    this._joinWaiter = null;
    waiter?.reject(new ChannelStateError(`Left ${this._topic} before the join completed`));

    try {
      if (this._socket.isConnected()) {
        await this._push(ChannelEvent.LEAVE, {}, timeoutMs);
      }
    } catch (err) {
      debug('Leave of %s not acknowledged: %o', this._topic, err);
    } finally {
      this._close();
    }
  }

  /**
   * Deliver an event routed by the socket.
   */
  triggerEvent(event: string, payload: unknown, ref: number | null): void {
    switch (event) {
      case ChannelEvent.REPLY:
        this._handleReply(payload, ref);
        break;

      case ChannelEvent.ERROR:
        debug('%s errored: %o', this._topic, payload);
        if (this._state === 'joining' || this._state === 'joined') {
          this._state = 'errored';
        }
        this._rejectPending(
          new ConnectionError(typeof payload === 'string' ? payload : `${this._topic} errored`)
        );
        break;

      case ChannelEvent.CLOSE:
        debug('%s closed by server', this._topic);
        this._close();
        break;
    }

    // An unhandled 'error' event would throw from EventEmitter.
    if (event === 'error' && this.listenerCount('error') === 0) return;
    this.emit(event, payload, ref);
  }

  private _rejoin(): void {
    if (this._state === 'errored' || (this._state === 'joining' && !this._joinInFlight)) {
      debug('Rejoining %s', this._topic);
      this._sendJoin();
    }
  }

  private _sendJoin(): void {
    this._state = 'joining';
    if (!this._socket.isConnected()) {
      debug('Join of %s deferred until the socket opens', this._topic);
      return;
    }
    if (this._joinInFlight) return;

    this._joinInFlight = true;
    this._pushJoin().catch((err) => debug('Join of %s failed: %o', this._topic, err));
  }

  private async _pushJoin(): Promise<void> {
    try {
      const response = await this._push(ChannelEvent.JOIN, this._params, this._joinTimeoutMs);
      if (this._state !== 'joining') return;
      this._state = 'joined';
      debug('Joined %s', this._topic);
      const waiter = this._joinWaiter;
      this._joinWaiter = null;
      waiter?.resolve(response);
    } catch (err) {
      if (this._state === 'joining') this._state = 'errored';
      const waiter = this._joinWaiter;
      this._joinWaiter = null;
      waiter?.reject(toError(err));
      throw err;
    } finally {
      this._joinInFlight = false;
    }
  }

  private _push(event: string, payload: unknown, timeoutMs: number): Promise<unknown> {
    const ref = this._socket.makeRef();

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this._pending.delete(ref);
        reject(new TimeoutError(`${event} on ${this._topic} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this._pending.set(ref, { event, resolve, reject, timeoutId });

      try {
        this._socket.push({ topic: this._topic, event, payload, ref });
      } catch (err) {
        clearTimeout(timeoutId);
        this._pending.delete(ref);
        reject(toError(err));
      }
    });
  }

  private _handleReply(payload: unknown, ref: number | null): void {
    if (ref === null) {
      debug('Ignoring reply without ref on %s', this._topic);
      return;
    }
    const pending = this._pending.get(ref);
    if (!pending) return;

    this._pending.delete(ref);
    clearTimeout(pending.timeoutId);

    const reply = parseReply(payload);
    if (!reply) {
      pending.reject(
        new MalformedEnvelopeError(`reply to ${pending.event} needs "status" and "response"`)
      );
      return;
    }

    if (reply.status === 'ok') {
      pending.resolve(reply.response);
    } else {
      pending.reject(new ReplyError(reply.status, reply.response));
    }
  }

  private _rejectPending(err: Error): void {
    for (const pending of this._pending.values()) {
      clearTimeout(pending.timeoutId);
      pending.reject(err);
    }
    this._pending.clear();
  }

  private _close(): void {
    this._state = 'closed';
    const closed = new ChannelStateError(`${this._topic} is closed`);
    this._rejectPending(closed);
    const waiter = this._joinWaiter;
    this._joinWaiter = null;
    waiter?.reject(closed);
    this._removeOpenListener?.();
    this._removeOpenListener = null;
    this._socket.removeChannel(this);
  }
}
