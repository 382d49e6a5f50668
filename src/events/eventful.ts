import { describeType } from '../core/errors.js';
import { isAsyncListener } from '../utils/callbacks.js';
import type { AnyListener, EventArgs, ListenerSpec } from '../core/types.js';

/** What an eventful needs from a sync bus it is bound to. */
export interface EventEmitter {
  emit(event: string, ...args: EventArgs): void;
}

/** What an eventful needs from an async bus it is bound to. */
export interface AsyncEventEmitter {
  emit(event: string, ...args: EventArgs): Promise<void>;
}

/**
 * An object that owns a fixed set of listener methods and can attach all of
 * them to a bus in one call.
 *
 * Subclasses declare their listeners from the constructor:
 *
 * ```ts
 * class Greeter extends Eventful {
 *   constructor() {
 *     super();
 *     this.listen('greeting', this.onGreeting);
 *   }
 *
 *   onGreeting(name: string) {
 *     console.log(`Hello, ${name}!`);
 *   }
 * }
 *
 * bus.bindEventful(new Greeter());
 * ```
 *
 * Each method is bound to the instance once, so the callback handed to every
 * bus is the same function and unbinding removes exactly what binding added.
 * Buses are remembered in a plain set; binding the same eventful from
 * concurrent code paths needs outside coordination.
 */
export abstract class AbstractEventful<TBus> {
  private readonly listeners: ListenerSpec[] = [];
  private readonly boundMethods = new Map<AnyListener, AnyListener>();
  private readonly buses = new Set<TBus>();

  abstract emit(event: string, ...args: EventArgs): void | Promise<void>;

  /**
   * Declare `method` as a listener for `event`. Declaring the same method for
   * the same event again replaces its priority.
   */
  protected listen(event: string, method: AnyListener, priority?: number): void {
    if (priority !== undefined && !Number.isInteger(priority)) {
      throw new TypeError(
        `Event listener expects priority to be an integer, but received ${describeType(priority)}`,
      );
    }

    let callback = this.boundMethods.get(method);
    if (!callback) {
      callback = method.bind(this);
      this.boundMethods.set(method, callback);
    }

    const spec: ListenerSpec = { event, callback, priority, isAsync: isAsyncListener(method) };
    const existing = this.listeners.findIndex(
      (l) => l.event === event && l.callback === callback,
    );
    if (existing === -1) this.listeners.push(spec);
    else this.listeners[existing] = spec;
  }

  getListeners(): readonly ListenerSpec[] {
    return Object.freeze([...this.listeners]);
  }

  getBoundBuses(): ReadonlySet<TBus> {
    return new Set(this.buses);
  }

  addBus(bus: TBus): void {
    this.buses.add(bus);
  }

  removeBus(bus: TBus): void {
    this.buses.delete(bus);
  }
}

/** Eventful for the blocking and threaded buses. */
export abstract class Eventful extends AbstractEventful<EventEmitter> {
  /** Emit into every bound bus, in binding order. */
  emit(event: string, ...args: EventArgs): void {
    for (const bus of this.getBoundBuses()) {
      bus.emit(event, ...args);
    }
  }
}

/** Eventful for `AsyncEventBus`; listener methods may be `async`. */
export abstract class AsyncEventful extends AbstractEventful<AsyncEventEmitter> {
  async emit(event: string, ...args: EventArgs): Promise<void> {
    await Promise.all([...this.getBoundBuses()].map((bus) => bus.emit(event, ...args)));
  }
}
