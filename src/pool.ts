/**
 * @module
 * `StreamingTaskPool` runs a bounded number of tasks at once, queues the rest,
 * and reports completions one at a time in the order they actually finish.
 *
 * The set of running tasks grows while it is being drained, so the pool keeps
 * its own active map and pending queue. Each task's guard puts its entry on a
 * completion queue once, when it settles, and waiting drains that queue.
 */

import { MAX_TASK_TIMEOUT_MS, type ResolvedPoolOptions, type TaskPoolOptions, resolvePoolOptions } from './config';
import {
  EmptyPoolError,
  InvalidOperationError,
  TaskTimeoutError,
  describeError,
  settle,
} from './errors';
import type { Logger } from './logger';
import { type StreamingTask, type TaskResult, isPromiseLike, isTaskResult } from './task';

// =================================================================
// Section 1: Types
// =================================================================

/**
 * One resolved task as reported by `waitForNextCompletion`.
 * `result` is `null` when the task failed, timed out or was cancelled.
 */
export interface Completion<T> {
  readonly id: string;
  readonly result: TaskResult<T> | null;
}

/** A point-in-time snapshot of the pool's bookkeeping. */
export interface PoolStats {
  readonly activeTasks: number;
  readonly pendingTasks: number;
  readonly completed: number;
  readonly failed: number;
  readonly timedOut: number;
  readonly cancelled: number;
  readonly totalProcessed: number;
}

interface ActiveTask<T> {
  readonly task: StreamingTask<T>;
  readonly controller: AbortController;
  /** The operation raced against its timeout and its abort signal. */
  readonly guard: Promise<TaskResult<T>>;
  /** Whether the task's signal had been aborted by the time `guard` settled. */
  abortedOnSettle: boolean;
}

// =================================================================
// Section 2: Guarding a Running Operation
// =================================================================

/**
 * Aborts `controller` whenever `parent` aborts. Returns the unlink function.
 */
function linkSignal(parent: AbortSignal | undefined, controller: AbortController): () => void {
  if (!parent) return () => {};
  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => {};
  }
  const onParentAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onParentAbort, { once: true });
  return () => parent.removeEventListener('abort', onParentAbort);
}

/**
 * Races `operation` against the task's abort signal. The timeout aborts that
 * signal with a `TaskTimeoutError`, so the operation sees the reason and the
 * guard rejects with it without waiting for the operation to notice.
 * When `operation` is undefined the guard settles only through the signal.
 */
function guardOperation<T>(
  task: StreamingTask<T>,
  controller: AbortController,
  operation: Promise<TaskResult<T>> | undefined,
): Promise<TaskResult<T>> {
  const { signal } = controller;
  let onAbort: () => void = () => {};

  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  const timer = setTimeout(() => {
    controller.abort(new TaskTimeoutError(task.id, task.timeoutMs));
  }, Math.min(task.timeoutMs, MAX_TASK_TIMEOUT_MS));

  return Promise.race(operation ? [operation, aborted] : [aborted]).finally(() => {
    clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
  });
}

// =================================================================
// Section 3: The Pool
// =================================================================

/**
 * Manages a dynamic pool of tasks with per-task timeouts.
 *
 * - At most `maxConcurrentTasks` run at once; the rest wait in FIFO order.
 * - A task's timeout clock starts when it starts, not when it is queued.
 * - Completions are reported one per `waitForNextCompletion` call, first
 *   finished first reported.
 * - Failures and timeouts are counted and logged, never thrown.
 *
 * The pool has a single owner (normally a `DynamicStreamingIterator`);
 * `waitForNextCompletion` must not be called concurrently.
 *
 * @template T The type of value the tasks publish.
 */
export class StreamingTaskPool<T> {
  private readonly options: ResolvedPoolOptions;
  private readonly active = new Map<string, ActiveTask<T>>();
  private readonly pending: StreamingTask<T>[] = [];
  /** Entries whose guard has settled, in settle order. */
  private readonly settledQueue: ActiveTask<T>[] = [];
  private wakeWaiter: (() => void) | undefined;

  private completedCount = 0;
  private failedCount = 0;
  private timeoutCount = 0;
  private cancelledCount = 0;

  constructor(options: TaskPoolOptions = {}) {
    this.options = resolvePoolOptions(options);
  }

  get maxConcurrentTasks(): number {
    return this.options.maxConcurrentTasks;
  }

  private get logger(): Logger {
    return this.options.logger;
  }

  /**
   * Starts the task now if a slot is free, otherwise queues it.
   * A full pool is a queuing decision, not an error.
   */
  addTask(task: StreamingTask<T>): void {
    if (this.active.size < this.options.maxConcurrentTasks) {
      this.startTask(task);
    } else {
      this.pending.push(task);
    }
  }

  /** Adds each task in order, so free slots are filled in submission order. */
  addTasks(tasks: Iterable<StreamingTask<T>>): void {
    for (const task of tasks) {
      this.addTask(task);
    }
  }

  private startTask(task: StreamingTask<T>): void {
    // A task whose id is already running is treated as already started.
    if (this.active.has(task.id)) {
      this.logger.debug(`Task ${task.id} is already active, not starting it again`);
      return;
    }

    const controller = new AbortController();
    const unlink = linkSignal(this.options.signal, controller);

    let operation: Promise<TaskResult<T>> | undefined;
    if (!controller.signal.aborted) {
      try {
        operation = task.operationFactory({ id: task.id, signal: controller.signal });
        if (!isPromiseLike(operation)) {
          throw new InvalidOperationError(`Factory for task '${task.id}' did not return a promise.`);
        }
      } catch (error) {
        unlink();
        this.failedCount++;
        this.logger.error(`Failed to start task ${task.id}: ${describeError(error)}`, error);
        return;
      }
    }

    const guard = guardOperation(task, controller, operation).finally(unlink);
    const entry: ActiveTask<T> = { task, controller, guard, abortedOnSettle: false };
    const onSettled = () => {
      entry.abortedOnSettle = controller.signal.aborted;
      this.settledQueue.push(entry);
      const wake = this.wakeWaiter;
      this.wakeWaiter = undefined;
      wake?.();
    };
    void guard.then(onSettled, onSettled);
    this.active.set(task.id, entry);

    this.logger.debug(`Started task ${task.id}`);
  }

  private startPendingTasks(): void {
    while (this.active.size < this.options.maxConcurrentTasks && this.pending.length > 0) {
      const next = this.pending.shift();
      if (next) this.startTask(next);
    }
  }

  /**
   * Suspends until the next active task finishes, fails or times out, removes
   * it from the pool, records the outcome, then promotes queued tasks into
   * the freed slots.
   *
   * @returns The task id and its result, or `null` as the result when the task
   *          did not complete normally.
   * @throws {EmptyPoolError} if there is nothing active or pending.
   */
  async waitForNextCompletion(): Promise<Completion<T>> {
    if (!this.hasActiveTasks()) {
      throw new EmptyPoolError();
    }
    // Only reachable when every earlier start failed and left the queue behind.
    if (this.active.size === 0) {
      this.startPendingTasks();
      if (this.active.size === 0) throw new EmptyPoolError();
    }

    const entry = await this.nextSettled();
    const { id } = entry.task;
    this.active.delete(id);

    const result = await this.recordOutcome(entry);

    this.startPendingTasks();

    return { id, result };
  }

  /** Takes the next settled entry that still belongs to the pool. */
  private async nextSettled(): Promise<ActiveTask<T>> {
    for (;;) {
      const entry = this.settledQueue.shift();
      if (entry) {
        if (this.active.get(entry.task.id) === entry) return entry;
        continue;
      }
      if (this.active.size === 0) throw new EmptyPoolError();
      await new Promise<void>((resolve) => {
        this.wakeWaiter = resolve;
      });
    }
  }

  private async recordOutcome(entry: ActiveTask<T>): Promise<TaskResult<T> | null> {
    const { task } = entry;
    const outcome = await settle(entry.guard);

    return outcome.match(
      (value): TaskResult<T> | null => {
        if (!isTaskResult<T>(value)) {
          this.failedCount++;
          this.logger.error(`Task ${task.id} failed: operation did not resolve to a TaskResult`);
          return null;
        }
        this.completedCount++;
        this.logger.debug(`Task ${task.id} completed successfully`);
        return value;
      },
      (error): null => {
        if (this.timedOut(entry, error)) {
          this.timeoutCount++;
          this.logger.warn(`Task ${task.id} timed out after ${task.timeoutMs}ms`);
        } else if (this.isCancellationOf(entry, error)) {
          this.cancelledCount++;
          this.logger.debug(`Task ${task.id} was cancelled`);
        } else {
          this.failedCount++;
          this.logger.error(`Task ${task.id} failed: ${describeError(error)}`, error);
        }
        return null;
      },
    );
  }

  /**
   * The signal's reason decides rather than `error`: an operation listening on
   * the signal may reject with its own error before the guard does.
   */
  private timedOut(entry: ActiveTask<T>, error: unknown): boolean {
    return (
      error instanceof TaskTimeoutError ||
      (entry.abortedOnSettle && entry.controller.signal.reason instanceof TaskTimeoutError)
    );
  }

  /** True when the task settled after the pool aborted it, other than by timeout. */
  private isCancellationOf(entry: ActiveTask<T>, error: unknown): boolean {
    return entry.abortedOnSettle && !this.timedOut(entry, error);
  }

  /** True while any task is running or queued. */
  hasActiveTasks(): boolean {
    return this.active.size > 0 || this.pending.length > 0;
  }

  activeTaskIds(): string[] {
    return Array.from(this.active.keys());
  }

  pendingTaskIds(): string[] {
    return this.pending.map((task) => task.id);
  }

  getStats(): PoolStats {
    return {
      activeTasks: this.active.size,
      pendingTasks: this.pending.length,
      completed: this.completedCount,
      failed: this.failedCount,
      timedOut: this.timeoutCount,
      cancelled: this.cancelledCount,
      totalProcessed: this.completedCount + this.failedCount + this.timeoutCount + this.cancelledCount,
    };
  }

  /**
   * Aborts every running task, waits for all of them to settle, then empties
   * the pool. Rejections caused by the abort are expected and dropped; any
   * other rejection is logged as a warning. Safe to call on an empty pool.
   */
  async shutdown(): Promise<void> {
    const entries = Array.from(this.active.values());

    for (const { controller } of entries) {
      if (!controller.signal.aborted) {
        controller.abort(new DOMException('Task pool shut down', 'AbortError'));
      }
    }

    await Promise.all(
      entries.map(async (entry) => {
        const outcome = await settle(entry.guard);
        if (outcome.isErr() && !this.isCancellationOf(entry, outcome.error)) {
          this.logger.warn(
            `Task ${entry.task.id} finished with exception during shutdown: ${describeError(outcome.error)}`,
          );
        }
      }),
    );

    this.active.clear();
    this.pending.length = 0;
    this.settledQueue.length = 0;
  }
}
