/**
 * Delayed, debounced task runner
 *
 * - schedule() while the timer is pending restarts the timer
 * - schedule() while the task runs joins the running task
 * - every caller of one round receives that round's single result
 */

type Pending<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export class RetryScheduler<T> {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pending: Pending<T> | null = null;
  private running: Promise<T> | null = null;

  constructor(
    private readonly name: string,
    private readonly delayMs: number
  ) {}

  schedule(task: () => Promise<T>): Promise<T> {
    if (this.running) {
      return this.running;
    }

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const pending = this.pending ?? createPending<T>();
    this.pending = pending;

    console.log(`[RetryScheduler:${this.name}] Running in ${this.delayMs}ms`);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.run(task, pending);
    }, this.delayMs);

    return pending.promise;
  }

  isScheduled(): boolean {
    return this.timer !== null;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  isActive(): boolean {
    return this.isScheduled() || this.isRunning();
  }

  /**
   * Stops a pending timer and settles its waiters with `settleWith`.
   * A task already running is left to finish.
   */
  cancel(settleWith: T): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending && !this.running) {
      this.pending.resolve(settleWith);
      this.pending = null;
    }
  }

  private run(task: () => Promise<T>, pending: Pending<T>): void {
    let running: Promise<T>;
    try {
      running = task();
    } catch (error) {
      running = Promise.reject(error);
    }
    this.running = running;

    void running.then(
      value => {
        this.finish(pending);
        pending.resolve(value);
      },
      (reason: unknown) => {
        this.finish(pending);
        pending.reject(reason);
      }
    );
  }

  private finish(pending: Pending<T>): void {
    this.running = null;
    if (this.pending === pending) {
      this.pending = null;
    }
  }
}

function createPending<T>(): Pending<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
