import { describe, it, expect } from 'vitest';
import { AsyncEventful, Eventful } from '../../src/events/eventful.js';
import { EventBus } from '../../src/events/eventBus.js';
import { AsyncEventBus } from '../../src/events/asyncEventBus.js';
import { ThreadedEventBus } from '../../src/events/threadedEventBus.js';

class Counter extends Eventful {
  readonly seen: string[] = [];

  constructor(priority?: number) {
    super();
    this.listen('tick', this.onTick, priority);
    this.listen('reset', this.onReset);
  }

  onTick(label: string) {
    this.seen.push(label);
  }

  onReset() {
    this.seen.length = 0;
  }

  redeclare(priority: number) {
    this.listen('tick', this.onTick, priority);
  }
}

class AsyncRecorder extends AsyncEventful {
  readonly seen: string[] = [];

  constructor() {
    super();
    this.listen('tick', this.onTick);
  }

  async onTick(label: string) {
    await new Promise<void>((resolve) => setTimeout(resolve, 2));
    this.seen.push(label);
  }
}

class AsyncOnSyncBus extends Eventful {
  constructor() {
    super();
    this.listen('plain', this.onPlain);
    this.listen('tick', this.onTick);
  }

  onPlain() {}

  async onTick() {}
}

class BadPriority extends Eventful {
  constructor() {
    super();
    this.listen('tick', this.onTick, 0.5);
  }

  onTick() {}
}

describe('Eventful', () => {
  it('binds every declared method with the instance as this', () => {
    const bus = new EventBus();
    const counter = new Counter();
    bus.bindEventful(counter);

    bus.emit('tick', 'a');
    bus.emit('tick', 'b');
    expect(counter.seen).toEqual(['a', 'b']);
    bus.emit('reset');
    expect(counter.seen).toEqual([]);
    expect(counter.getBoundBuses().has(bus)).toBe(true);
  });

  it('hands every bus the same bound callback', () => {
    const first = new EventBus();
    const second = new EventBus();
    const counter = new Counter(3);
    first.bindEventful(counter);
    second.bindEventful(counter);

    const [tick] = counter.getListeners();
    expect(tick.priority).toBe(3);
    expect(first.getCallbacks('tick')).toEqual([[tick.callback]]);
    expect(second.getCallbacks('tick')).toEqual([[tick.callback]]);
  });

  it('unbinds exactly what it bound', () => {
    const bus = new EventBus();
    const other = () => undefined;
    bus.add('tick', other);
    const counter = new Counter();
    bus.bindEventful(counter);
    bus.unbindEventful(counter);

    expect(bus.getCallbacks('tick')).toEqual([[other]]);
    expect(bus.events()).toEqual(['tick']);
    expect(counter.getBoundBuses().size).toBe(0);
  });

  it('emits into every bound bus', () => {
    const first = new EventBus();
    const second = new ThreadedEventBus({ maxWorkers: 1 });
    const heard: string[] = [];
    first.add('ping', () => heard.push('first'));
    const counter = new Counter();
    first.bindEventful(counter);
    second.bindEventful(counter);

    counter.emit('ping');
    expect(heard).toEqual(['first']);
    expect(counter.getBoundBuses()).toEqual(new Set([first, second]));
  });

  it('replaces the priority when a method is declared again', () => {
    const counter = new Counter(5);
    counter.redeclare(1);
    const ticks = counter.getListeners().filter((spec) => spec.event === 'tick');
    expect(ticks).toHaveLength(1);
    expect(ticks[0].priority).toBe(1);
  });

  it('rejects a non-integer priority when declaring', () => {
    expect(() => new BadPriority()).toThrow(
      new TypeError(
        'Event listener expects priority to be an integer, but received non-integer number',
      ),
    );
  });

  it('binds nothing when a sync bus meets an async method', () => {
    const bus = new EventBus();
    const eventful = new AsyncOnSyncBus();
    expect(() => bus.bindEventful(eventful)).toThrow(
      new TypeError('EventBus event listener bound onTick cannot be an async function.'),
    );
    expect(bus.events()).toEqual([]);
    expect(eventful.getBoundBuses().size).toBe(0);
  });

  it('rejects values that are not eventfuls', () => {
    const bus = new EventBus();
    expect(() => Reflect.apply(bus.bindEventful, bus, [42])).toThrow(
      new TypeError('bindEventful expects an Eventful instance, but received integer instead.'),
    );
    expect(() => Reflect.apply(bus.unbindEventful, bus, [new AsyncRecorder()])).toThrow(
      new TypeError(
        'unbindEventful expects an Eventful instance, but received AsyncRecorder instead.',
      ),
    );
  });

  it('returns frozen listener snapshots', () => {
    const counter = new Counter();
    const listeners = counter.getListeners();
    expect(Object.isFrozen(listeners)).toBe(true);
    expect(listeners.map((spec) => spec.event)).toEqual(['tick', 'reset']);
  });
});

describe('AsyncEventful', () => {
  it('awaits async methods through the async bus', async () => {
    const bus = new AsyncEventBus();
    const recorder = new AsyncRecorder();
    bus.bindEventful(recorder);
    await recorder.emit('tick', 'one');
    expect(recorder.seen).toEqual(['one']);

    bus.unbindEventful(recorder);
    await bus.emit('tick', 'two');
    expect(recorder.seen).toEqual(['one']);
  });

  it('only binds to the async bus', () => {
    const bus = new AsyncEventBus();
    expect(() => Reflect.apply(bus.bindEventful, bus, [new Counter()])).toThrow(
      new TypeError('bindEventful expects an AsyncEventful instance, but received Counter instead.'),
    );
  });
});
