/**
 * A unit of work scheduled on the queue
 */
export interface QueueTask<T> {
  id: string;
  run: () => Promise<T>;
}

export type TaskOutcome<T> =
  | { id: string; status: 'fulfilled'; value: T }
  | { id: string; status: 'rejected'; error: unknown }
  | { id: string; status: 'cancelled' };

/**
 * Bounded worker pool: at most maxConcurrent tasks run at once, the rest wait
 * in FIFO order. Outcomes are delivered through onTaskSettled in completion
 * order; callers key them by task id.
 */
export class GenerationQueue<T> {
  private pending: QueueTask<T>[] = [];
  private running: Set<string> = new Set();
  private settled = { fulfilled: 0, rejected: 0, cancelled: 0 };
  private maxConcurrent: number;
  private idleWaiters: Array<() => void> = [];
  private settledListeners: Array<(outcome: TaskOutcome<T>) => void> = [];

  constructor(maxConcurrent: number = 1) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Add a task; it starts immediately when a slot is free
   */
  enqueue(task: QueueTask<T>): void {
    this.pending.push(task);
    this.processQueue();
  }

  /**
   * Drop a task that has not started yet
   */
  cancel(id: string): boolean {
    const index = this.pending.findIndex((t) => t.id === id);
    if (index === -1) {
      return false;
    }

    this.pending.splice(index, 1);
    this.settled.cancelled++;
    this.emit({ id, status: 'cancelled' });
    this.checkIdle();
    return true;
  }

  /**
   * Drop every task that has not started yet; running tasks are left alone
   */
  cancelPending(): number {
    const dropped = this.pending.splice(0);
    for (const task of dropped) {
      this.settled.cancelled++;
      this.emit({ id: task.id, status: 'cancelled' });
    }
    this.checkIdle();
    return dropped.length;
  }

  /**
   * Resolves once nothing is pending or running
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  onTaskSettled(listener: (outcome: TaskOutcome<T>) => void): void {
    this.settledListeners.push(listener);
  }

  isIdle(): boolean {
    return this.pending.length === 0 && this.running.size === 0;
  }

  getStatistics() {
    return {
      pending: this.pending.length,
      running: this.running.size,
      fulfilled: this.settled.fulfilled,
      rejected: this.settled.rejected,
      cancelled: this.settled.cancelled,
      maxConcurrent: this.maxConcurrent,
    };
  }

  private processQueue(): void {
    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const task = this.pending.shift();
      if (task) {
        this.running.add(task.id);
        void this.execute(task);
      }
    }
  }

  private async execute(task: QueueTask<T>): Promise<void> {
    let outcome: TaskOutcome<T>;
    try {
      const value = await task.run();
      outcome = { id: task.id, status: 'fulfilled', value };
      this.settled.fulfilled++;
    } catch (error) {
      outcome = { id: task.id, status: 'rejected', error };
      this.settled.rejected++;
    }

    this.running.delete(task.id);
    this.emit(outcome);
    this.processQueue();
    this.checkIdle();
  }

  private emit(outcome: TaskOutcome<T>): void {
    for (const listener of this.settledListeners) {
      try {
        listener(outcome);
      } catch (error) {
        console.error(`[GenerationQueue] Listener failed for task ${outcome.id}:`, error);
      }
    }
  }

  private checkIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters.splice(0);
    waiters.forEach((resolve) => resolve());
  }
}
