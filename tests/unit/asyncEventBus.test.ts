import { describe, it, expect, vi } from 'vitest';
import { AsyncEventBus } from '../../src/events/asyncEventBus.js';
import { FatalError } from '../../src/core/errors.js';

const tick = (ms = 5) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('AsyncEventBus', () => {
  it('accepts async listeners', () => {
    const bus = new AsyncEventBus();
    expect(() => bus.add('e', async () => undefined)).not.toThrow();
    expect(bus.listenerCount('e')).toBe(1);
  });

  it('waits for a whole group before starting the next one', async () => {
    const bus = new AsyncEventBus<{ greet: [name: string] }>();
    const calls: string[] = [];
    bus.add('greet', async (name) => {
      calls.push(`a:start:${name}`);
      await tick();
      calls.push('a:end');
    }, 1);
    bus.add('greet', () => calls.push('b'), 1);
    bus.add('greet', () => calls.push('c'), 2);

    await bus.emit('greet', 'world');
    expect(calls).toEqual(['a:start:world', 'b', 'a:end', 'c']);
  });

  it('starts the first group before emit yields', () => {
    const bus = new AsyncEventBus();
    const calls: string[] = [];
    bus.add('e', async () => {
      calls.push('first');
      await tick();
    }, 1);
    bus.add('e', () => calls.push('second'), 2);

    const done = bus.emit('e');
    expect(calls).toEqual(['first']);
    return done;
  });

  it('runs listeners of one group concurrently', async () => {
    const bus = new AsyncEventBus();
    const gate = deferred();
    const started: string[] = [];
    bus.add('e', async () => {
      started.push('x');
      await gate.promise;
    });
    bus.add('e', async () => {
      started.push('y');
      await gate.promise;
    });

    const done = bus.emit('e');
    await tick();
    expect(started).toEqual(['x', 'y']);
    gate.resolve();
    await done;
  });

  it('announces the emission on the meta event', async () => {
    const bus = new AsyncEventBus();
    const meta = vi.fn();
    bus.add('event', meta);
    await bus.emit('greet', 'world');
    expect(meta).toHaveBeenCalledWith('greet', ['world']);
  });

  it('reports failures once the group settles and carries on', async () => {
    const calls: string[] = [];
    const errorHandler = vi.fn(() => {
      calls.push('handler');
    });
    const bus = new AsyncEventBus({ errorHandler });
    const rejected = new Error('rejected');
    const thrown = new Error('thrown');
    bus.add('e', async () => {
      await tick();
      throw rejected;
    }, 1);
    bus.add('e', () => {
      throw thrown;
    }, 1);
    bus.add('e', () => calls.push('next group'), 2);

    await bus.emit('e', 7);

    expect(calls).toEqual(['handler', 'handler', 'next group']);
    expect(errorHandler.mock.calls).toEqual([
      ['e', thrown, [7]],
      ['e', rejected, [7]],
    ]);
  });

  it('rejects emit with a fatal error thrown synchronously', async () => {
    const errorHandler = vi.fn();
    const bus = new AsyncEventBus({ errorHandler });
    const later = vi.fn();
    const fatal = new FatalError('stop');
    bus.add('e', () => {
      throw fatal;
    }, 1);
    bus.add('e', later, 2);

    await expect(bus.emit('e')).rejects.toBe(fatal);
    expect(later).not.toHaveBeenCalled();
    expect(errorHandler).not.toHaveBeenCalled();
  });

  it('settles the rest of a group abandoned by a fatal error', async () => {
    const errorHandler = vi.fn();
    const bus = new AsyncEventBus({ errorHandler });
    const fatal = new FatalError('stop');
    bus.add('e', async () => {
      await tick();
      throw new Error('orphan');
    });
    bus.add('e', () => {
      throw fatal;
    });

    await expect(bus.emit('e')).rejects.toBe(fatal);
    await tick(20);
    expect(errorHandler).not.toHaveBeenCalled();
  });

  it('rejects emit with a fatal rejection', async () => {
    const bus = new AsyncEventBus({ errorHandler: vi.fn() });
    const fatal = new FatalError('late stop');
    bus.add('e', async () => {
      throw fatal;
    });
    await expect(bus.emit('e')).rejects.toBe(fatal);
  });

  it('lets an error handler failure reach the caller', async () => {
    const handlerError = new Error('handler broke');
    const bus = new AsyncEventBus({
      errorHandler: () => {
        throw handlerError;
      },
    });
    bus.add('e', () => {
      throw new Error('listener broke');
    });
    await expect(bus.emit('e')).rejects.toBe(handlerError);
  });

  it('resolves immediately for events without listeners', async () => {
    const bus = new AsyncEventBus();
    await expect(bus.emit('nothing')).resolves.toBeUndefined();
  });
});
