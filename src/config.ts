/**
 * @module
 * Options, defaults and validation for `StreamingTaskPool` and
 * `DynamicStreamingIterator`.
 */

import { StreamingConfigError } from './errors';
import { type Logger, noopLogger } from './logger';

export const DEFAULT_MAX_CONCURRENT_TASKS = 10;
export const DEFAULT_MAX_TOTAL_TASKS = 1000;
export const DEFAULT_TASK_TIMEOUT_MS = 30_000;
/** The largest delay `setTimeout` honours. Longer delays fire after 1ms. */
export const MAX_TASK_TIMEOUT_MS = 2_147_483_647;

/**
 * Options for a `StreamingTaskPool`.
 */
export interface TaskPoolOptions {
  /**
   * The maximum number of tasks running at once. Extra tasks wait in a FIFO queue.
   * @default 10
   */
  maxConcurrentTasks?: number;
  /**
   * Receives start, failure, timeout and shutdown messages.
   * @default noopLogger
   */
  logger?: Logger;
  /**
   * Aborting this signal cancels every task the pool has started.
   */
  signal?: AbortSignal;
}

/**
 * Options for a `DynamicStreamingIterator`.
 */
export interface StreamingOptions extends TaskPoolOptions {
  /**
   * The cumulative number of tasks (initial plus spawned) the iterator will
   * ever admit. Tasks over the cap are dropped.
   * @default 1000
   */
  maxTotalTasks?: number;
}

export interface ResolvedPoolOptions {
  maxConcurrentTasks: number;
  logger: Logger;
  signal: AbortSignal | undefined;
}

export interface ResolvedStreamingOptions extends ResolvedPoolOptions {
  maxTotalTasks: number;
}

export function resolvePoolOptions(options: TaskPoolOptions = {}): ResolvedPoolOptions {
  const maxConcurrentTasks = options.maxConcurrentTasks ?? DEFAULT_MAX_CONCURRENT_TASKS;
  if (!Number.isInteger(maxConcurrentTasks) || maxConcurrentTasks < 1) {
    throw new StreamingConfigError('maxConcurrentTasks', 'a positive integer', maxConcurrentTasks);
  }

  return {
    maxConcurrentTasks,
    logger: options.logger ?? noopLogger,
    signal: options.signal,
  };
}

export function resolveStreamingOptions(options: StreamingOptions = {}): ResolvedStreamingOptions {
  const maxTotalTasks = options.maxTotalTasks ?? DEFAULT_MAX_TOTAL_TASKS;
  if (!Number.isInteger(maxTotalTasks) || maxTotalTasks < 0) {
    throw new StreamingConfigError('maxTotalTasks', 'a non-negative integer', maxTotalTasks);
  }

  return { ...resolvePoolOptions(options), maxTotalTasks };
}
