import { BaseEventBus, type EventArgsOf } from './baseEventBus.js';
import { AsyncEventful, type AsyncEventEmitter } from './eventful.js';
import { describeType, isFatalError } from '../core/errors.js';
import { META_EVENT, type BusKind, type EventArgs, type EventMap, type EventName } from '../core/types.js';
import { invokeListener, isPromiseLike } from '../utils/callbacks.js';
import { dispatchDurationSeconds, emissionsTotal } from '../metrics/index.js';

/**
 * Event bus for the event loop. Listeners may be plain or `async`.
 *
 * Each priority group is started synchronously: every listener is called
 * in order, and whatever promises they return run concurrently. The bus
 * waits for the whole group to settle, reports its failures, and only then
 * starts the next group. A group in which nobody returned a promise does
 * not yield at all.
 */
export class AsyncEventBus<E extends EventMap = EventMap> extends BaseEventBus<E> {
  protected readonly kind: BusKind = 'async';

  async emit<K extends EventName<E>>(event: K, ...args: EventArgsOf<E, K>): Promise<void> {
    emissionsTotal.inc({ bus: this.kind });
    const endTimer = dispatchDurationSeconds.startTimer({ bus: this.kind });
    try {
      await Promise.all([
        this.dispatchEvent(META_EVENT, [event, args]),
        this.dispatchEvent(event, args),
      ]);
    } finally {
      endTimer();
    }
  }

  bindEventful(eventful: AsyncEventful): void {
    this.attachEventful(checkAsyncEventful(eventful, 'bindEventful'), this.asEmitter());
  }

  unbindEventful(eventful: AsyncEventful): void {
    this.detachEventful(checkAsyncEventful(eventful, 'unbindEventful'), this.asEmitter());
  }

  private async dispatchEvent(event: string, args: EventArgs): Promise<void> {
    for (const callbacks of this.callbacksFor(event)) {
      const pending: PromiseLike<unknown>[] = [];
      const errors: unknown[] = [];

      // Start the whole group before waiting on any of it
      for (const callback of callbacks) {
        try {
          const result = invokeListener(callback, args);
          if (isPromiseLike(result)) pending.push(result);
        } catch (error) {
          if (isFatalError(error)) {
            // The group is abandoned; its promises still settle somewhere
            void Promise.allSettled(pending);
            throw error;
          }
          errors.push(error);
        }
      }

      if (pending.length > 0) {
        const settled = await Promise.allSettled(pending);
        for (const outcome of settled) {
          if (outcome.status === 'rejected') errors.push(outcome.reason);
        }
      }

      for (const error of errors) {
        if (isFatalError(error)) throw error;
        this.reportError(event, error, args);
      }
    }
  }

  private asEmitter(): AsyncEventEmitter {
    return this;
  }
}

function checkAsyncEventful(value: unknown, operation: string): AsyncEventful {
  if (!(value instanceof AsyncEventful)) {
    throw new TypeError(
      `${operation} expects an AsyncEventful instance, but received ${describeType(value)} instead.`,
    );
  }
  return value;
}
