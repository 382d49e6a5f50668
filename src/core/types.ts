// Shared types for the registry, the buses and the eventful collaborator

export type EventArgs = unknown[];

/**
 * Maps event names to the argument tuple their listeners receive.
 * Interfaces need the index signature spelled out to satisfy it.
 */
export interface EventMap {
  [event: string]: EventArgs;
}

export const META_EVENT = 'event';

/** Every emission is announced on the `event` meta event first. */
export interface MetaEvents {
  [META_EVENT]: [event: string, args: EventArgs];
}

export type BusEvents<E extends EventMap> = E & MetaEvents;

export type EventName<E extends EventMap> = keyof BusEvents<E> & string;

export type Listener<A extends EventArgs = EventArgs> = (...args: A) => unknown;

/** Any function at all; what the registry stores once types are erased. */
export type AnyListener = (...args: never) => unknown;

export type CallbackGroup = readonly AnyListener[];
export type CallbackGroups = readonly CallbackGroup[];

export type ErrorHandler = (event: string, error: unknown, args: EventArgs) => void;

export type BusKind = 'blocking' | 'async' | 'threaded';

export interface BusOptions {
  defaultPriority?: number;
  errorHandler?: ErrorHandler;
}

export interface ThreadedBusOptions extends BusOptions {
  maxWorkers?: number;
}

export interface ListenerSpec {
  readonly event: string;
  readonly callback: AnyListener;
  readonly priority?: number;
  /** Whether the declared method was `async`; binding hides it from the callback. */
  readonly isAsync: boolean;
}
