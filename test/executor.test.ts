/**
 * SerialExecutor tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SerialExecutor } from '../src/SerialExecutor.ts';
import { delay } from './helpers.ts';

describe('SerialExecutor', () => {
  it('should run tasks in submission order, one at a time', async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];

    executor.enqueue(async () => {
      log.push('a:start');
      await delay(20);
      log.push('a:end');
    });
    executor.enqueue(() => {
      log.push('b');
    });

    await executor.idle();
    assert.deepStrictEqual(log, ['a:start', 'a:end', 'b']);
  });

  it('should not run a task on the stack that submitted it', async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];

    executor.enqueue(() => {
      log.push('task');
    });
    assert.deepStrictEqual(log, []);

    await executor.idle();
    assert.deepStrictEqual(log, ['task']);
  });

  it('should isolate a throwing task and keep draining', async () => {
    const errors: Error[] = [];
    const executor = new SerialExecutor((err) => errors.push(err));
    const log: string[] = [];

    executor.enqueue(() => {
      throw new Error('boom');
    });
    executor.enqueue(async () => {
      await delay(1);
      throw new Error('async boom');
    });
    executor.enqueue(() => {
      log.push('after');
    });

    await executor.idle();
    assert.deepStrictEqual(
      errors.map((err) => err.message),
      ['boom', 'async boom']
    );
    assert.deepStrictEqual(log, ['after']);
  });

  it('should wrap non-Error throws', async () => {
    const errors: Error[] = [];
    const executor = new SerialExecutor((err) => errors.push(err));

    executor.enqueue(() => {
      throw 'plain string';
    });

    await executor.idle();
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0]?.message, 'plain string');
  });

  it('should resolve run() with the task result', async () => {
    const executor = new SerialExecutor();
    const result = await executor.run(() => 42);
    assert.strictEqual(result, 42);
  });

  it('should reject run() without reporting to the error handler', async () => {
    const errors: Error[] = [];
    const executor = new SerialExecutor((err) => errors.push(err));

    await assert.rejects(
      executor.run(() => {
        throw new Error('run failed');
      }),
      { message: 'run failed' }
    );
    assert.deepStrictEqual(errors, []);
  });

  it('should keep run() and enqueue() in one order', async () => {
    const executor = new SerialExecutor();
    const log: number[] = [];

    executor.enqueue(() => {
      log.push(1);
    });
    const second = executor.run(() => {
      log.push(2);
    });
    executor.enqueue(() => {
      log.push(3);
    });

    await second;
    assert.deepStrictEqual(log.slice(0, 2), [1, 2]);
    await executor.idle();
    assert.deepStrictEqual(log, [1, 2, 3]);
  });

  it('should include tasks submitted while draining in idle()', async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];

    executor.enqueue(() => {
      log.push('outer');
      executor.enqueue(() => {
        log.push('inner');
      });
    });

    await executor.idle();
    assert.deepStrictEqual(log, ['outer', 'inner']);
  });

  it('should resolve idle() at once when nothing is queued', async () => {
    const executor = new SerialExecutor();
    await executor.idle();
  });

  it('should survive an error handler that throws', async () => {
    const executor = new SerialExecutor(() => {
      throw new Error('handler broke');
    });
    const log: string[] = [];

    executor.enqueue(() => {
      throw new Error('boom');
    });
    executor.enqueue(() => {
      log.push('after');
    });

    await executor.idle();
    assert.deepStrictEqual(log, ['after']);
  });
});
