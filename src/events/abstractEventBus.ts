import { BaseEventBus, type EventArgsOf } from './baseEventBus.js';
import { Eventful, type EventEmitter } from './eventful.js';
import { listenerName } from '../utils/callbacks.js';
import { describeType } from '../core/errors.js';
import type { AnyListener, EventMap, EventName } from '../core/types.js';

/**
 * Base of the buses whose `emit` returns nothing: listeners must be plain
 * functions, and only sync eventfuls can be bound.
 */
export abstract class AbstractEventBus<E extends EventMap = EventMap> extends BaseEventBus<E> {
  abstract emit<K extends EventName<E>>(event: K, ...args: EventArgsOf<E, K>): void;

  /**
   * Bind every listener of `eventful` to this bus.
   *
   * @throws TypeError when `eventful` is not an `Eventful` or declares an
   * `async` listener; nothing is bound in that case.
   */
  bindEventful(eventful: Eventful): void {
    this.attachEventful(checkEventful(eventful, 'bindEventful'), this.asEmitter());
  }

  /** Unbind every listener of `eventful` from this bus. */
  unbindEventful(eventful: Eventful): void {
    this.detachEventful(checkEventful(eventful, 'unbindEventful'), this.asEmitter());
  }

  protected override validateListener(callback: AnyListener, isAsync: boolean): void {
    if (isAsync) {
      throw new TypeError(
        `${this.constructor.name} event listener ${listenerName(callback)} cannot be an async function.`,
      );
    }
  }

  private asEmitter(): EventEmitter {
    return this;
  }
}

function checkEventful(value: unknown, operation: string): Eventful {
  if (!(value instanceof Eventful)) {
    throw new TypeError(
      `${operation} expects an Eventful instance, but received ${describeType(value)} instead.`,
    );
  }
  return value;
}
