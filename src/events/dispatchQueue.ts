/**
 * Unbounded FIFO with unfinished-task accounting: `join()` resolves only
 * once every item ever `put` has been matched by a `taskDone()`, so an item
 * that has been taken but is still being processed keeps joiners waiting.
 */
export class DispatchQueue<T> {
  private readonly items: T[] = [];
  private readonly getters: Array<(item: T) => void> = [];
  private joiners: Array<{ resolve: () => void; reject: (error: unknown) => void }> = [];
  private pendingTasks = 0;

  get size(): number {
    return this.items.length;
  }

  get unfinished(): number {
    return this.pendingTasks;
  }

  put(item: T): void {
    this.pendingTasks += 1;
    const getter = this.getters.shift();
    if (getter) getter(item);
    else this.items.push(item);
  }

  get(): Promise<T> {
    if (this.items.length > 0) {
      const [head] = this.items.splice(0, 1);
      return Promise.resolve(head);
    }
    return new Promise<T>((resolve) => this.getters.push(resolve));
  }

  taskDone(): void {
    if (this.pendingTasks <= 0) {
      throw new Error('taskDone() called more times than there were items');
    }
    this.pendingTasks -= 1;
    if (this.pendingTasks === 0) this.settleJoiners();
  }

  join(): Promise<void> {
    if (this.pendingTasks === 0) return Promise.resolve();
    return new Promise<void>((resolve, reject) => this.joiners.push({ resolve, reject }));
  }

  /** Drop queued items and fail every joiner with `error`; returns what was dropped. */
  abort(error: unknown): T[] {
    const dropped = this.items.splice(0, this.items.length);
    this.pendingTasks = 0;
    const joiners = this.joiners;
    this.joiners = [];
    for (const joiner of joiners) joiner.reject(error);
    return dropped;
  }

  private settleJoiners(): void {
    const joiners = this.joiners;
    this.joiners = [];
    for (const joiner of joiners) joiner.resolve();
  }
}
