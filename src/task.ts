/**
 * @module
 * Task descriptors and task results: the units of work a `StreamingTaskPool`
 * schedules and the values they hand back.
 */

import { DEFAULT_TASK_TIMEOUT_MS, MAX_TASK_TIMEOUT_MS } from './config';
import { InvalidOperationError } from './errors';

// =================================================================
// Section 1: Core Types
// =================================================================

/**
 * What a running operation is told about itself. The `signal` is aborted when
 * the task times out or the pool shuts down; honouring it is up to the operation.
 *
 * @example
 * ```typescript
 * const fetchAuthor = ({ signal }: TaskScope) =>
 *   fetch(url, { signal }).then(res => res.json()).then(author => taskResult(updateAuthor(author)));
 * ```
 */
export interface TaskScope {
  readonly id: string;
  readonly signal: AbortSignal;
}

/**
 * A recipe for one run of an operation. Every call must start fresh work;
 * the pool calls it exactly once per descriptor it starts.
 * Zero-argument functions are accepted and simply ignore the scope.
 */
export type OperationFactory<T> = (scope: TaskScope) => Promise<TaskResult<T>>;

/**
 * The outcome of one task: an optional value to publish and the follow-up
 * tasks it spawned.
 *
 * @template T The published value type.
 */
export interface TaskResult<T> {
  /** Handed to the stream consumer when present. */
  readonly publishable?: T;
  /** Enqueued after this result is consumed, in order. */
  readonly next: ReadonlyArray<StreamingTask<T>>;
}

/**
 * An immutable description of schedulable work. It stores the recipe only,
 * never a running promise.
 */
export interface StreamingTask<T> {
  readonly id: string;
  readonly operationFactory: OperationFactory<T>;
  readonly timeoutMs: number;
  /** Epoch milliseconds at construction. Informational. */
  readonly createdAt: number;
}

/** `[id, factory, timeoutMs]`, as accepted by `createDynamicIterator`. */
export type TaskSpec<T> = readonly [id: string, factory: OperationFactory<T>, timeoutMs?: number];

// =================================================================
// Section 2: Constructors
// =================================================================

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Builds a frozen `StreamingTask` from an id, an operation factory and a timeout.
 *
 * A promise that is already running cannot be restarted, so passing one
 * instead of a factory is rejected.
 *
 * @throws {InvalidOperationError} if `factory` is a promise or not a function,
 *         if `id` is empty, or if `timeoutMs` is negative, not finite or
 *         above `MAX_TASK_TIMEOUT_MS`.
 *
 * @example
 * ```typescript
 * createStreamingTask('search:authors', () => searchAuthors(keywords), 30_000); // ok
 * createStreamingTask('search:authors', searchAuthors(keywords));               // throws
 * ```
 */
export function createStreamingTask<T>(
  id: string,
  factory: OperationFactory<T> | PromiseLike<TaskResult<T>>,
  timeoutMs: number = DEFAULT_TASK_TIMEOUT_MS,
): StreamingTask<T> {
  if (typeof id !== 'string' || id.length === 0) {
    throw new InvalidOperationError('Task id must be a non-empty string.');
  }
  if (isPromiseLike(factory)) {
    throw new InvalidOperationError(
      `Cannot create task '${id}' from an already-created promise. ` +
        'Provide a factory function that returns a fresh promise.',
    );
  }
  if (typeof factory !== 'function') {
    throw new InvalidOperationError(`Task '${id}' needs a factory function that returns a promise.`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new InvalidOperationError(`Task '${id}' timeout must be a non-negative number of milliseconds.`);
  }
  if (timeoutMs > MAX_TASK_TIMEOUT_MS) {
    throw new InvalidOperationError(
      `Task '${id}' timeout of ${timeoutMs}ms exceeds the maximum of ${MAX_TASK_TIMEOUT_MS}ms.`,
    );
  }

  return Object.freeze({
    id,
    operationFactory: factory,
    timeoutMs,
    createdAt: Date.now(),
  });
}

/**
 * Builds a `TaskResult`. Omit `publishable` for tasks that only spawn work.
 */
export function taskResult<T>(
  publishable?: T,
  next: ReadonlyArray<StreamingTask<T>> = [],
): TaskResult<T> {
  return publishable === undefined ? { next } : { publishable, next };
}

/**
 * Checks the shape the pool relies on: an object with a `next` array.
 * The type of `publishable` is not checked.
 */
export function isTaskResult<T>(value: unknown): value is TaskResult<T> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'next' in value &&
    Array.isArray(value.next)
  );
}
