/**
 * Single-worker FIFO task queue.
 *
 * Tasks run one at a time, in submission order, and never on the stack of
 * the code that submitted them. A task that throws (or rejects) fails alone:
 * the error goes to the `onError` handler and the queue keeps draining.
 */

import createDebug from 'debug';
import { toError } from './errors.ts';

const debug = createDebug('phx-socket:executor');

export type Task<T = void> = () => T | Promise<T>;

export class SerialExecutor {
  private _queue: Task<void>[] = [];
  private _draining = false;
  private _idleWaiters: (() => void)[] = [];
  private _onError: (err: Error) => void;

  constructor(onError?: (err: Error) => void) {
    this._onError = onError ?? ((err) => debug('Task failed: %o', err));
  }

  /**
   * Submit a task and forget it. Failures are reported to `onError`.
   */
  enqueue(task: Task<unknown>): void {
    this._queue.push(async () => {
      await task();
    });
    this._schedule();
  }

  /**
   * Submit a task and wait for its result. Failures reject the returned
   * promise instead of reaching `onError`.
   *
   * Must not be awaited from inside another task of the same executor: the
   * awaited task sits behind the caller and never starts.
   */
  run<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this._queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(toError(err));
        }
      });
      this._schedule();
    });
  }

  /**
   * Resolve once the queue is empty, including tasks submitted meanwhile.
   */
  idle(): Promise<void> {
    if (!this._draining) return Promise.resolve();
    return new Promise((resolve) => this._idleWaiters.push(resolve));
  }

  private _schedule(): void {
    if (this._draining) return;
    this._draining = true;
    queueMicrotask(() => {
      this._drain().catch((err) => debug('Drain failed: %o', err));
    });
  }

  private async _drain(): Promise<void> {
    let next = this._queue.shift();
    while (next) {
      try {
        await next();
      } catch (err) {
        this._report(toError(err));
      }
      next = this._queue.shift();
    }

    this._draining = false;
    const waiters = this._idleWaiters;
    this._idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private _report(err: Error): void {
    try {
      this._onError(err);
    } catch (handlerErr) {
      debug('Task error handler threw: %o', handlerErr);
    }
  }
}
