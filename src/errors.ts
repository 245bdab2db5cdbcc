/**
 * @module
 * Error types raised by the streaming pool and iterator, plus helpers for
 * telling a cancellation apart from a real failure and for turning a settled
 * promise into a `Result`.
 */

import { ResultAsync } from 'neverthrow';

// =================================================================
// Section 1: Error Hierarchy
// =================================================================

/**
 * Base class for every error the library throws. Catch this to handle any
 * streaming-specific failure in one place.
 */
export class StreamingError extends Error {
  public readonly _tag: string = 'StreamingError';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StreamingError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised inside a task's guard when its operation outlives `timeoutMs`.
 * The task's signal is aborted with this error as the reason.
 */
export class TaskTimeoutError extends StreamingError {
  public override readonly _tag = 'TaskTimeoutError' as const;
  public readonly taskId: string;
  public readonly timeoutMs: number;

  constructor(taskId: string, timeoutMs: number) {
    super(`Task '${taskId}' timed out after ${timeoutMs}ms.`);
    this.name = 'TaskTimeoutError';
    this.taskId = taskId;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown by `waitForNextCompletion` when there is nothing left to wait for.
 * Callers should check `hasActiveTasks()` first.
 */
export class EmptyPoolError extends StreamingError {
  public override readonly _tag = 'EmptyPoolError' as const;

  constructor() {
    super('No active or pending tasks to wait for.');
    this.name = 'EmptyPoolError';
  }
}

/**
 * Thrown when a task is built from something that is not a re-invokable
 * operation factory, e.g. a promise that is already running.
 */
export class InvalidOperationError extends StreamingError {
  public override readonly _tag = 'InvalidOperationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

/** Thrown when a `DynamicStreamingIterator` is iterated a second time. */
export class IteratorConsumedError extends StreamingError {
  public override readonly _tag = 'IteratorConsumedError' as const;

  constructor() {
    super('DynamicStreamingIterator can only be consumed once.');
    this.name = 'IteratorConsumedError';
  }
}

/** Thrown when pool or iterator options are out of range. */
export class StreamingConfigError extends StreamingError {
  public override readonly _tag = 'StreamingConfigError' as const;
  public readonly option: string;

  constructor(option: string, expected: string, actual: unknown) {
    super(`Invalid option '${option}': expected ${expected}, got ${String(actual)}`);
    this.name = 'StreamingConfigError';
    this.option = option;
  }
}

// =================================================================
// Section 2: Classification Helpers
// =================================================================

/**
 * True when `error` is the rejection produced by aborting an `AbortSignal`
 * without a custom reason (a `DOMException` or `Error` named `AbortError`).
 */
export function isCancellation(error: unknown): boolean {
  return (
    (error instanceof DOMException || error instanceof Error) &&
    error.name === 'AbortError'
  );
}

/** Human-readable text for any thrown value, for log lines. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/** Wraps non-`Error` rejection values so every failure carries a stack. */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error !== undefined ? error : 'Unknown error'));
}

/**
 * Converts a promise into a `ResultAsync` that never rejects: fulfilment
 * becomes `Ok`, rejection becomes `Err` with the reason coerced to `Error`.
 *
 * @example
 * ```typescript
 * const outcome = await settle(fetchAuthor('abc'));
 * if (outcome.isErr()) logger.error(outcome.error.message);
 * ```
 */
export function settle<T>(promise: PromiseLike<T>): ResultAsync<T, Error> {
  return ResultAsync.fromPromise(promise, toError);
}
