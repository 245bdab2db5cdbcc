/**
 * @module
 * `DynamicStreamingIterator` turns a set of initial tasks into an async stream
 * of published values. Each finished task may publish one value and spawn
 * follow-up tasks, which join the same pool until a global task cap is hit.
 */

import { type ResolvedStreamingOptions, type StreamingOptions, resolveStreamingOptions } from './config';
import { EmptyPoolError, IteratorConsumedError, describeError } from './errors';
import type { Logger } from './logger';
import { type Completion, type PoolStats, StreamingTaskPool } from './pool';
import { type StreamingTask, type TaskSpec, createStreamingTask } from './task';

export interface IteratorStats extends PoolStats {
  readonly totalTasksCreated: number;
  readonly droppedTasks: number;
  readonly maxTotalTasks: number;
}

/**
 * An async iterable that drives a `StreamingTaskPool`, yielding each
 * publishable value as soon as its task finishes.
 *
 * - Values arrive in completion order, never batched.
 * - Failed, timed-out and dropped tasks simply contribute nothing.
 * - The pool is always shut down when iteration ends, including when the
 *   consumer stops early, so no task keeps running unsupervised.
 * - It can be iterated once. A second `for await` throws `IteratorConsumedError`.
 *
 * @template T The type of value the tasks publish.
 *
 * @example
 * ```typescript
 * const iterator = new DynamicStreamingIterator([searchTask], {
 *   maxConcurrentTasks: 5,
 *   maxTotalTasks: 50,
 *   signal: AbortSignal.timeout(60_000),
 * });
 *
 * for await (const packet of iterator) {
 *   send(packet);
 * }
 * ```
 */
export class DynamicStreamingIterator<T> implements AsyncIterable<T> {
  private readonly options: ResolvedStreamingOptions;
  private readonly controller = new AbortController();
  private readonly pool: StreamingTaskPool<T>;
  private readonly initialTasks: ReadonlyArray<StreamingTask<T>>;

  private totalTasksCreated = 0;
  private droppedTaskCount = 0;
  private consumed = false;

  constructor(initialTasks: ReadonlyArray<StreamingTask<T>>, options: StreamingOptions = {}) {
    this.options = resolveStreamingOptions(options);
    this.initialTasks = [...initialTasks];
    this.pool = new StreamingTaskPool<T>({
      maxConcurrentTasks: this.options.maxConcurrentTasks,
      logger: this.options.logger,
      signal: this.controller.signal,
    });
  }

  private get logger(): Logger {
    return this.options.logger;
  }

  /** The underlying pool, for inspection. */
  get taskPool(): StreamingTaskPool<T> {
    return this.pool;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new IteratorConsumedError();
    }
    this.consumed = true;
    return this.iterate();
  }

  /**
   * Stops the stream: every running task is aborted and the iteration ends
   * normally once the in-flight wait returns.
   */
  cancel(reason?: unknown): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason ?? new DOMException('Stream cancelled', 'AbortError'));
    }
  }

  getStats(): IteratorStats {
    return {
      ...this.pool.getStats(),
      totalTasksCreated: this.totalTasksCreated,
      droppedTasks: this.droppedTaskCount,
      maxTotalTasks: this.options.maxTotalTasks,
    };
  }

  /** Splits `tasks` into those under the global cap and drops the rest. */
  private admit(tasks: ReadonlyArray<StreamingTask<T>>): StreamingTask<T>[] {
    const admitted: StreamingTask<T>[] = [];
    for (const task of tasks) {
      if (this.totalTasksCreated < this.options.maxTotalTasks) {
        admitted.push(task);
        this.totalTasksCreated++;
      } else {
        this.droppedTaskCount++;
        this.logger.warn(
          `Max tasks limit (${this.options.maxTotalTasks}) reached, skipping new task: ${task.id}`,
        );
      }
    }
    return admitted;
  }

  private linkExternalSignal(): () => void {
    const external = this.options.signal;
    if (!external) return () => {};
    const onAbort = () => this.cancel(external.reason);
    if (external.aborted) {
      onAbort();
      return () => {};
    }
    external.addEventListener('abort', onAbort, { once: true });
    return () => external.removeEventListener('abort', onAbort);
  }

  private async *iterate(): AsyncGenerator<T, void, undefined> {
    const unlink = this.linkExternalSignal();
    const { signal } = this.controller;

    try {
      if (!signal.aborted) {
        this.pool.addTasks(this.admit(this.initialTasks));
      }
      this.logger.info(`Started streaming iterator with ${this.initialTasks.length} initial tasks`);

      while (!signal.aborted && this.pool.hasActiveTasks()) {
        let completion: Completion<T>;
        try {
          completion = await this.pool.waitForNextCompletion();
        } catch (error) {
          if (error instanceof EmptyPoolError) break;
          this.logger.error(`Error in streaming iterator: ${describeError(error)}`, error);
          continue;
        }

        const { id, result } = completion;
        if (!result) continue;

        if (result.publishable !== undefined) {
          yield result.publishable;
        }

        if (result.next.length > 0) {
          this.logger.debug(`Task ${id} spawned ${result.next.length} new tasks`);
          const admitted = this.admit(result.next);
          if (admitted.length > 0) {
            this.pool.addTasks(admitted);
            this.logger.debug(`Added ${admitted.length} new tasks from ${id}`);
          }
        }
      }

      if (signal.aborted) {
        this.logger.info(`Streaming cancelled: ${describeError(signal.reason)}`);
      }
      this.logger.info('Streaming completed.', this.getStats());
    } finally {
      await this.pool.shutdown();
      unlink();
    }
  }
}

/**
 * Builds a `DynamicStreamingIterator` from `[id, factory, timeoutMs]` tuples.
 *
 * @example
 * ```typescript
 * const iterator = createDynamicIterator<Streamable>(
 *   [
 *     ['authors', () => searchAuthors(query), 30_000],
 *     ['publications', () => searchPublications(query), 30_000],
 *   ],
 *   { maxConcurrentTasks: 5, maxTotalTasks: 50 },
 * );
 * ```
 */
export function createDynamicIterator<T>(
  specs: ReadonlyArray<TaskSpec<T>>,
  options: StreamingOptions = {},
): DynamicStreamingIterator<T> {
  const initialTasks = specs.map(([id, factory, timeoutMs]) => createStreamingTask(id, factory, timeoutMs));
  return new DynamicStreamingIterator<T>(initialTasks, options);
}
