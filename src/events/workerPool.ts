import { IllegalStateError } from '../core/errors.js';

export type Task<T> = () => T | PromiseLike<T>;

/**
 * Runs submitted tasks with at most `maxWorkers` in flight; the rest wait
 * their turn in submission order. Each task starts on its own macrotask,
 * never on the submitter's stack.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private closed = false;

  constructor(readonly maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get waitingCount(): number {
    return this.waiting.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async submit<T>(task: Task<T>): Promise<T> {
    if (this.closed) {
      throw new IllegalStateError('Cannot submit a task to a closed worker pool.');
    }
    if (this.active < this.maxWorkers) {
      this.active += 1;
    } else {
      // release() hands its slot straight over, so `active` is already counted
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    try {
      await new Promise<void>((resolve) => setImmediate(resolve));
      return await task();
    } finally {
      this.release();
    }
  }

  /** Refuse new work. Tasks already submitted still run to completion. */
  close(): void {
    this.closed = true;
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) next();
    else this.active -= 1;
  }
}
