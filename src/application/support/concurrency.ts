/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep input order.
 * After the first failure no new items are started and the returned promise rejects with it.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
};

export type PoolTask = () => Promise<void>;

/** Bounded in-process worker pool; tasks beyond `concurrency` wait in FIFO order. */
export class WorkerPool {
  private readonly pending: PoolTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly onTaskError: (error: unknown) => void,
  ) {}

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.pending.length;
  }

  submit(task: PoolTask): void {
    this.pending.push(task);
    this.pump();
  }

  onIdle(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) {
        return;
      }

      this.running += 1;
      void task()
        .catch((error: unknown) => this.onTaskError(error))
        .finally(() => {
          this.running -= 1;
          this.pump();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.pending.length > 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
