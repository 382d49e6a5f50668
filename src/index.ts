export { EventBus } from './events/eventBus.js';
export { AsyncEventBus } from './events/asyncEventBus.js';
export { ThreadedEventBus } from './events/threadedEventBus.js';
export { AbstractEventBus } from './events/abstractEventBus.js';
export { BaseEventBus } from './events/baseEventBus.js';
export type { EventArgsOf, ListenerOf } from './events/baseEventBus.js';
export { ListenerRegistry } from './events/listenerRegistry.js';
export { AbstractEventful, Eventful, AsyncEventful } from './events/eventful.js';
export type { EventEmitter, AsyncEventEmitter } from './events/eventful.js';
export { WorkerPool } from './events/workerPool.js';
export { DispatchQueue } from './events/dispatchQueue.js';
export {
  IllegalStateError,
  FatalError,
  InterruptError,
  isFatalError,
} from './core/errors.js';
export { META_EVENT } from './core/types.js';
export type {
  AnyListener,
  BusEvents,
  BusOptions,
  CallbackGroup,
  CallbackGroups,
  ErrorHandler,
  EventArgs,
  EventMap,
  EventName,
  Listener,
  ListenerSpec,
  MetaEvents,
  ThreadedBusOptions,
} from './core/types.js';
export { DEFAULT_PRIORITY, loadConfig } from './config/index.js';
export type { AppConfig } from './config/index.js';
export { getLogger, logDispatchError } from './utils/logging.js';
export {
  registry as metricsRegistry,
  enableDefaultMetrics,
  metricsSummary,
} from './metrics/index.js';
