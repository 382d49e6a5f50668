import { loadConfig } from '../config/index.js';
import { listenerErrorsTotal } from '../metrics/index.js';
import { isAsyncListener } from '../utils/callbacks.js';
import { logDispatchError } from '../utils/logging.js';
import { ListenerRegistry } from './listenerRegistry.js';
import type { AbstractEventful } from './eventful.js';
import type {
  AnyListener,
  BusEvents,
  BusKind,
  BusOptions,
  CallbackGroups,
  ErrorHandler,
  EventArgs,
  EventMap,
  EventName,
  Listener,
} from '../core/types.js';

/** Argument tuple of `K` in `E`, meta event included. */
export type EventArgsOf<E extends EventMap, K extends EventName<E>> =
  BusEvents<E>[K] extends infer A extends EventArgs ? A : never;

export type ListenerOf<E extends EventMap, K extends EventName<E>> = Listener<EventArgsOf<E, K>>;

/**
 * Listener bookkeeping shared by every bus: the priority registry, the
 * per-instance error handler and eventful binding. Subclasses decide how
 * the groups returned by `getCallbacks` get invoked.
 */
export abstract class BaseEventBus<E extends EventMap = EventMap> {
  /**
   * Receives every listener failure with the event name and the emitted
   * arguments. Replace it to change what happens on failure.
   */
  errorHandler: ErrorHandler;

  protected abstract readonly kind: BusKind;
  private readonly listeners: ListenerRegistry;

  // Configuration is only consulted for options the caller left out
  constructor(options: BusOptions = {}) {
    this.listeners = new ListenerRegistry(
      options.defaultPriority ?? loadConfig().bus.defaultPriority,
    );
    this.errorHandler = options.errorHandler ?? logDispatchError;
  }

  get defaultPriority(): number {
    return this.listeners.defaultPriority;
  }

  /** Callbacks for `event` grouped by ascending priority. */
  getCallbacks<K extends EventName<E>>(event: K): CallbackGroups {
    return this.listeners.getCallbacks(event);
  }

  /**
   * Bind `callback` to `event`. Without a priority the bus default is used;
   * adding a callback that is already bound moves it to the new priority.
   */
  add<K extends EventName<E>>(event: K, callback: ListenerOf<E, K>, priority?: number): void {
    this.addListener(event, callback, priority);
  }

  remove<K extends EventName<E>>(event: K, callback: ListenerOf<E, K>): void {
    this.listeners.remove(event, callback);
  }

  /**
   * Registration helper for inline listeners; the returned function binds
   * whatever it receives and hands it back unchanged.
   *
   * ```ts
   * const onGreet = bus.on('greet', 1)((name) => console.log(name));
   * ```
   */
  on<K extends EventName<E>>(event: K, priority?: number) {
    return <F extends ListenerOf<E, K>>(callback: F): F => {
      this.add(event, callback, priority);
      return callback;
    };
  }

  has<K extends EventName<E>>(event: K, callback: ListenerOf<E, K>): boolean {
    return this.listeners.has(event, callback);
  }

  listenerCount<K extends EventName<E>>(event: K): number {
    return this.listeners.listenerCount(event);
  }

  events(): string[] {
    return this.listeners.events();
  }

  protected callbacksFor(event: string): CallbackGroups {
    return this.listeners.getCallbacks(event);
  }

  protected addListener(event: string, callback: AnyListener, priority?: number): void {
    this.validateListener(callback, isAsyncListener(callback));
    this.listeners.add(event, callback, priority);
  }

  /** Hook for buses that only accept some kinds of callbacks. */
  protected validateListener(_callback: AnyListener, _isAsync: boolean): void {}

  protected reportError(event: string, error: unknown, args: EventArgs): void {
    listenerErrorsTotal.inc({ bus: this.kind });
    this.errorHandler(event, error, args);
  }

  protected attachEventful<TBus>(eventful: AbstractEventful<TBus>, bus: TBus): void {
    // Validate everything up front so a rejected listener leaves nothing behind
    const specs = eventful.getListeners();
    for (const spec of specs) {
      this.validateListener(spec.callback, spec.isAsync);
      this.listeners.priority(spec.priority);
    }
    eventful.addBus(bus);
    for (const spec of specs) {
      this.listeners.add(spec.event, spec.callback, spec.priority);
    }
  }

  protected detachEventful<TBus>(eventful: AbstractEventful<TBus>, bus: TBus): void {
    for (const spec of eventful.getListeners()) {
      this.listeners.remove(spec.event, spec.callback);
    }
    eventful.removeBus(bus);
  }
}
