import { types } from 'util';
import type { AnyListener, EventArgs } from '../core/types.js';

/** True for `async function` / `async () =>` declarations, decided without calling them. */
export function isAsyncListener(callback: AnyListener): boolean {
  return types.isAsyncFunction(callback);
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

export function invokeListener(callback: AnyListener, args: EventArgs): unknown {
  return Reflect.apply(callback, undefined, args);
}

export function listenerName(callback: AnyListener): string {
  return callback.name || '<anonymous>';
}
