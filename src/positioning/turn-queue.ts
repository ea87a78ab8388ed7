export type Job = () => void;
export type JobErrorHandler = (error: unknown) => void;

/**
 * Single serialization point for scheduler state.
 *
 * run() executes jobs one at a time in arrival order. A job enqueued while
 * another is running (a provider calling back synchronously, a timer firing
 * from inside a turn) waits for the current one instead of nesting.
 * defer() holds work until the queue is empty, so result sinks never run
 * inside a turn.
 */
export class TurnQueue {
  private jobs: Job[] = [];
  private deferred: Job[] = [];
  private draining = false;

  constructor(private readonly onError: JobErrorHandler) {}

  run(job: Job): void {
    this.jobs.push(job);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.jobs.shift();
      while (next) {
        this.invoke(next);
        next = this.jobs.shift();
      }
    } finally {
      this.draining = false;
    }

    this.flushDeferred();
  }

  /** Queue a callback for after the current drain (or run it now when idle) */
  defer(callback: Job): void {
    this.deferred.push(callback);
    if (!this.draining) this.flushDeferred();
  }

  private flushDeferred(): void {
    while (this.deferred.length > 0 && !this.draining) {
      const batch = this.deferred;
      this.deferred = [];
      for (const callback of batch) {
        this.invoke(callback);
      }
    }
  }

  private invoke(job: Job): void {
    try {
      job();
    } catch (error) {
      this.onError(error);
    }
  }
}
