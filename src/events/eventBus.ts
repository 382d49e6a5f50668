import { AbstractEventBus } from './abstractEventBus.js';
import type { EventArgsOf } from './baseEventBus.js';
import { isFatalError } from '../core/errors.js';
import { META_EVENT, type BusKind, type EventArgs, type EventMap, type EventName } from '../core/types.js';
import { invokeListener, isPromiseLike } from '../utils/callbacks.js';
import { dispatchDurationSeconds, emissionsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';

/**
 * Synchronous event bus. `emit` runs every listener on the caller's stack,
 * one priority group after another, and returns when the last one is done.
 *
 * - Never throws listener errors to callers; they go to `errorHandler`
 * - A listener that emits again is dispatched depth first
 */
export class EventBus<E extends EventMap = EventMap> extends AbstractEventBus<E> {
  protected readonly kind: BusKind = 'blocking';

  emit<K extends EventName<E>>(event: K, ...args: EventArgsOf<E, K>): void {
    emissionsTotal.inc({ bus: this.kind });
    const endTimer = dispatchDurationSeconds.startTimer({ bus: this.kind });
    try {
      this.dispatchEvent(META_EVENT, [event, args]);
      this.dispatchEvent(event, args);
    } finally {
      endTimer();
    }
  }

  private dispatchEvent(event: string, args: EventArgs): void {
    for (const callbacks of this.callbacksFor(event)) {
      for (const callback of callbacks) {
        try {
          const result = invokeListener(callback, args);
          if (isPromiseLike(result)) {
            // Not awaited; only keep a rejection from going unhandled
            void result.then(undefined, (error: unknown) => this.reportLate(event, error, args));
          }
        } catch (error) {
          if (isFatalError(error)) throw error;
          this.reportError(event, error, args);
        }
      }
    }
  }

  /**
   * Failure of a listener's promise after `emit` returned. Nothing can
   * receive a throw here, so fatal errors and error handler failures are
   * logged instead.
   */
  private reportLate(event: string, error: unknown, args: EventArgs): void {
    if (isFatalError(error)) {
      getLogger().fatal({ err: error, event }, 'listener promise failed fatally after dispatch');
      return;
    }
    try {
      this.reportError(event, error, args);
    } catch (handlerError) {
      getLogger().error({ err: handlerError, event }, 'event bus error handler failed');
    }
  }
}
