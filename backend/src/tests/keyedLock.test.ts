import { KeyedLock } from '../lib/keyedLock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => { resolve = () => r(); });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  test('runs tasks under the same key one after another, in call order', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.run('car', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.run('car', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.pendingKeys).toBe(0);
  });

  test('tasks under different keys do not wait for each other', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const slow = lock.run('a', async () => {
      await gate.promise;
      return 'a';
    });
    await expect(lock.run('b', async () => 'b')).resolves.toBe('b');

    gate.resolve();
    await expect(slow).resolves.toBe('a');
  });

  test('a failing task rejects its caller but not the next task', async () => {
    const lock = new KeyedLock();

    const failing = lock.run('car', async () => {
      throw new Error('boom');
    });
    const next = lock.run('car', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    expect(lock.pendingKeys).toBe(0);
  });
});
