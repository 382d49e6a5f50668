import os from 'os';
import { AbstractEventBus } from './abstractEventBus.js';
import type { EventArgsOf } from './baseEventBus.js';
import { DispatchQueue } from './dispatchQueue.js';
import { WorkerPool } from './workerPool.js';
import { IllegalStateError, isFatalError } from '../core/errors.js';
import {
  META_EVENT,
  type BusKind,
  type EventArgs,
  type EventMap,
  type EventName,
  type ThreadedBusOptions,
} from '../core/types.js';
import { invokeListener } from '../utils/callbacks.js';
import { getLogger } from '../utils/logging.js';
import { loadConfig } from '../config/index.js';
import { dispatchDurationSeconds, emissionsTotal, queueDepth } from '../metrics/index.js';

const SHUTDOWN = Symbol('shutdown');

interface QueuedEmission {
  readonly event: string;
  readonly args: EventArgs;
}

type QueueItem = QueuedEmission | typeof SHUTDOWN;

/**
 * Queued event bus. `emit` only enqueues; a dispatch loop started by
 * `start()` drains the queue one emission at a time and hands every
 * listener of a priority group to a worker pool, waiting for the group
 * before moving on.
 *
 * Emissions while the bus is stopped are dropped.
 *
 * ```ts
 * const bus = new ThreadedEventBus({ maxWorkers: 4 });
 * await bus.use(async (b) => {
 *   b.add('greeting', (name) => console.log(`Hello, ${name}!`));
 *   b.emit('greeting', 'world');
 * });
 * ```
 */
export class ThreadedEventBus<E extends EventMap = EventMap> extends AbstractEventBus<E> {
  protected readonly kind: BusKind = 'threaded';
  readonly maxWorkers: number;
  private readonly queue = new DispatchQueue<QueueItem>();
  private loop: Promise<void> | null = null;
  private isRunning = false;
  private isStopping = false;
  private crash: { error: unknown } | null = null;

  constructor(options: ThreadedBusOptions = {}) {
    super(options);
    this.maxWorkers =
      options.maxWorkers ?? loadConfig().bus.maxWorkers ?? os.availableParallelism();
    if (!Number.isInteger(this.maxWorkers) || this.maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${this.maxWorkers}`);
    }
  }

  get running(): boolean {
    return this.isRunning;
  }

  emit<K extends EventName<E>>(event: K, ...args: EventArgsOf<E, K>): void {
    if (!this.isRunning) return;
    emissionsTotal.inc({ bus: this.kind });
    queueDepth.inc();
    this.queue.put({ event, args });
  }

  /**
   * Start the dispatch loop and its worker pool.
   *
   * @throws IllegalStateError when already running, or while a shutdown is
   * still draining the queue.
   */
  start(): void {
    if (this.isRunning) {
      throw new IllegalStateError('Event bus is already running.');
    }
    if (this.isStopping) {
      throw new IllegalStateError('Event bus is shutting down.');
    }
    this.isRunning = true;
    this.crash = null;
    this.loop = this.dispatchLoop(new WorkerPool(this.maxWorkers));
    getLogger().debug({ maxWorkers: this.maxWorkers }, 'event bus started');
  }

  /**
   * Stop accepting emissions, let everything already queued finish, then
   * stop the loop and close the pool. There is no timeout.
   *
   * @throws IllegalStateError when not running.
   */
  async shutdown(): Promise<void> {
    if (!this.isRunning) {
      throw new IllegalStateError('Event bus is already shutdown.');
    }
    this.isRunning = false;
    this.isStopping = true;
    this.queue.put(SHUTDOWN);

    try {
      await this.loop;
    } finally {
      this.loop = null;
      this.isStopping = false;
    }
    if (this.crash) throw this.crash.error;
    getLogger().debug('event bus shut down');
  }

  /** Resolves once every emission queued so far has been fully dispatched. */
  waitForIdle(): Promise<void> {
    return this.queue.join();
  }

  /**
   * Run `fn` with the bus running: start it if needed, and shut it down
   * afterwards if it is still running, whether `fn` succeeded or not. A
   * fatal error that stopped the loop during the run is rethrown.
   */
  async use<T>(fn: (bus: this) => T | PromiseLike<T>): Promise<T> {
    if (!this.isRunning) this.start();
    try {
      return await fn(this);
    } finally {
      if (this.isRunning) await this.shutdown();
      else if (this.crash) throw this.crash.error;
    }
  }

  private async dispatchLoop(pool: WorkerPool): Promise<void> {
    try {
      for (;;) {
        const item = await this.queue.get();
        if (item === SHUTDOWN) {
          this.queue.taskDone();
          break;
        }
        queueDepth.dec();

        const endTimer = dispatchDurationSeconds.startTimer({ bus: this.kind });
        try {
          await this.dispatchEvent(pool, META_EVENT, [item.event, item.args]);
          await this.dispatchEvent(pool, item.event, item.args);
        } finally {
          endTimer();
        }
        // Only after the whole emission, so joiners never see a half-done one
        this.queue.taskDone();
      }
    } catch (error) {
      this.isRunning = false;
      this.crash = { error };
      const dropped = this.queue.abort(error).filter((item) => item !== SHUTDOWN).length;
      queueDepth.dec(dropped);
      getLogger().fatal({ err: error, dropped }, 'event bus dispatch loop stopped');
    } finally {
      pool.close();
    }
  }

  private async dispatchEvent(pool: WorkerPool, event: string, args: EventArgs): Promise<void> {
    for (const callbacks of this.callbacksFor(event)) {
      const fatal: unknown[] = [];
      await Promise.all(
        callbacks.map((callback) =>
          pool.submit(() => invokeListener(callback, args)).then(undefined, (error: unknown) => {
            if (isFatalError(error)) fatal.push(error);
            else this.forward(event, error, args);
          }),
        ),
      );
      if (fatal.length > 0) throw fatal[0];
    }
  }

  // The loop must outlive a failing error handler
  private forward(event: string, error: unknown, args: EventArgs): void {
    try {
      this.reportError(event, error, args);
    } catch (handlerError) {
      if (isFatalError(handlerError)) throw handlerError;
      getLogger().error({ err: handlerError, event }, 'event bus error handler failed');
    }
  }
}
