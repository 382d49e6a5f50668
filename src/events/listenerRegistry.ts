import { describeType } from '../core/errors.js';
import type { AnyListener, CallbackGroup, CallbackGroups } from '../core/types.js';

interface RegisteredListener {
  readonly callback: AnyListener;
  readonly priority: number;
}

const NO_GROUPS: CallbackGroups = Object.freeze([]);

/**
 * Per-event listeners kept sorted by ascending priority (FIFO among equal
 * priorities), plus a frozen snapshot of the same listeners grouped by
 * priority for dispatch.
 *
 * Every mutation builds a new snapshot and swaps it in, so a dispatch that
 * already fetched the groups keeps iterating them untouched while listeners
 * are added or removed underneath it.
 */
export class ListenerRegistry {
  private readonly sorted = new Map<string, RegisteredListener[]>();
  private readonly cached = new Map<string, CallbackGroups>();

  constructor(readonly defaultPriority: number) {
    if (!Number.isInteger(defaultPriority)) {
      throw new TypeError(
        `Default priority must be an integer, not ${describeType(defaultPriority)}`,
      );
    }
  }

  /** Resolve an optional priority against the default and check it is an integer. */
  priority(value?: number): number {
    const resolved = value ?? this.defaultPriority;
    if (!Number.isInteger(resolved)) {
      throw new TypeError(`Priority must be an integer, not ${describeType(resolved)}`);
    }
    return resolved;
  }

  getCallbacks(event: string): CallbackGroups {
    return this.cached.get(event) ?? NO_GROUPS;
  }

  add(event: string, callback: AnyListener, priority?: number): void {
    const listener: RegisteredListener = { callback, priority: this.priority(priority) };

    let listeners = this.sorted.get(event);
    if (!listeners) {
      listeners = [];
      this.sorted.set(event, listeners);
    }

    // Re-registration moves the callback to its new priority
    const existing = listeners.findIndex((l) => l.callback === callback);
    if (existing !== -1) listeners.splice(existing, 1);

    listeners.splice(upperBound(listeners, listener.priority), 0, listener);
    this.refresh(event, listeners);
  }

  remove(event: string, callback: AnyListener): void {
    const listeners = this.sorted.get(event);
    if (!listeners) return;

    const index = listeners.findIndex((l) => l.callback === callback);
    if (index === -1) return;
    listeners.splice(index, 1);

    if (listeners.length === 0) {
      this.sorted.delete(event);
      this.cached.delete(event);
      return;
    }
    this.refresh(event, listeners);
  }

  has(event: string, callback: AnyListener): boolean {
    return this.sorted.get(event)?.some((l) => l.callback === callback) ?? false;
  }

  listenerCount(event: string): number {
    return this.sorted.get(event)?.length ?? 0;
  }

  events(): string[] {
    return [...this.sorted.keys()];
  }

  private refresh(event: string, listeners: readonly RegisteredListener[]): void {
    const groups: CallbackGroup[] = [];
    let current: AnyListener[] = [];
    let currentPriority: number | undefined;

    for (const listener of listeners) {
      if (currentPriority !== undefined && listener.priority !== currentPriority) {
        groups.push(Object.freeze(current));
        current = [];
      }
      current.push(listener.callback);
      currentPriority = listener.priority;
    }
    if (current.length > 0) groups.push(Object.freeze(current));

    this.cached.set(event, Object.freeze(groups));
  }
}

// First index whose priority is greater than `priority`
function upperBound(listeners: readonly RegisteredListener[], priority: number): number {
  let lo = 0;
  let hi = listeners.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (listeners[mid].priority <= priority) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
