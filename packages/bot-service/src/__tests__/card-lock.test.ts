import { describe, it, expect } from 'vitest';
import { createKeyedLock } from '../card-lock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createKeyedLock', () => {
  it('runs tasks for the same key one at a time, in order', async () => {
    const lock = createKeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run('card-a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('card-a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not serialize different keys', async () => {
    const lock = createKeyedLock();
    const gate = deferred();
    const started: string[] = [];

    const a = lock.run('card-a', async () => {
      started.push('a');
      await gate.promise;
    });
    const b = lock.run('card-b', async () => {
      started.push('b');
    });

    await b;
    expect(started).toEqual(['a', 'b']);

    gate.resolve();
    await a;
  });

  it('keeps going after a task rejects and propagates the rejection', async () => {
    const lock = createKeyedLock();

    const failing = lock.run('card-a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('card-a', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
