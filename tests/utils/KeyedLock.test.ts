import { KeyedLock } from '../../src/utils/KeyedLock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  let lock: KeyedLock;

  beforeEach(() => {
    lock = new KeyedLock();
  });

  it('should serialize sections for the same key', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = lock.withKey('movie:Dune:2021', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.withKey('movie:Dune:2021', async () => {
      events.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.size).toBe(0);
  });

  it('should run different keys concurrently', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = lock.withKey('a', async () => {
      events.push('a:start');
      await gate.promise;
      events.push('a:end');
    });
    const second = lock.withKey('b', async () => {
      events.push('b');
    });

    await second;
    expect(events).toEqual(['a:start', 'b']);

    gate.resolve();
    await first;
  });

  it('should release the key when a section throws', async () => {
    await expect(
      lock.withKey('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.withKey('a', async () => 'ok')).resolves.toBe('ok');
  });

  it('should wait for earlier keyed sections and hold back later ones while exclusive', async () => {
    const events: string[] = [];
    const keyedGate = deferred();
    const exclusiveGate = deferred();

    const keyed = lock.withKey('a', async () => {
      await keyedGate.promise;
      events.push('keyed');
    });
    const exclusive = lock.withExclusive(async () => {
      events.push('exclusive:start');
      await exclusiveGate.promise;
      events.push('exclusive:end');
    });
    const later = lock.withKey('b', async () => {
      events.push('later');
    });

    keyedGate.resolve();
    await keyed;
    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['keyed', 'exclusive:start']);

    exclusiveGate.resolve();
    await Promise.all([exclusive, later]);
    expect(events).toEqual(['keyed', 'exclusive:start', 'exclusive:end', 'later']);
  });
});
