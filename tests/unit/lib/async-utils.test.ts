/**
 * Async Utilities Tests
 */

import { describe, it, expect } from 'vitest';
import { SerialQueue, withTimeout } from '../../../src/lib/async-utils.js';
import { deferred } from '../../helpers/test-utils.js';

describe('withTimeout', () => {
  it('should resolve with the value when the work finishes first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, () => new Error('late'))).resolves.toBe(
      'done',
    );
  });

  it('should reject with the timeout error when the timer fires first', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10, () => new Error('took too long'))).rejects.toThrow(
      'took too long',
    );
  });

  it('should pass the work rejection through', async () => {
    await expect(
      withTimeout(Promise.reject(new Error('failed')), 1000, () => new Error('late')),
    ).rejects.toThrow('failed');
  });
});

describe('SerialQueue', () => {
  it('should run tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = queue.run(async () => {
      order.push('second');
    });

    expect(queue.size).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.size).toBe(0);
  });

  it('should keep running after a failed task', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
