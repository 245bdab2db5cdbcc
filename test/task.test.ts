import { describe, it, expect, vi } from 'vitest';
import {
  createStreamingTask,
  isPromiseLike,
  isTaskResult,
  taskResult,
  type TaskResult,
} from '../src/task';
import { DEFAULT_TASK_TIMEOUT_MS, MAX_TASK_TIMEOUT_MS } from '../src/config';
import { InvalidOperationError } from '../src/errors';

const done = async (): Promise<TaskResult<string>> => taskResult('done');

describe('Tasks (task.ts)', () => {
  describe('createStreamingTask', () => {
    it('should store the factory without calling it', () => {
      const factory = vi.fn(done);

      const task = createStreamingTask<string>('search', factory, 5_000);

      expect(task.id).toBe('search');
      expect(task.operationFactory).toBe(factory);
      expect(task.timeoutMs).toBe(5_000);
      expect(typeof task.createdAt).toBe('number');
      expect(factory).not.toHaveBeenCalled();
    });

    it('should default the timeout to 30 seconds', () => {
      const task = createStreamingTask('search', done);

      expect(task.timeoutMs).toBe(DEFAULT_TASK_TIMEOUT_MS);
      expect(task.timeoutMs).toBe(30_000);
    });

    it('should accept a zero timeout', () => {
      expect(createStreamingTask('instant', done, 0).timeoutMs).toBe(0);
    });

    it('should return a frozen descriptor', () => {
      const task = createStreamingTask('search', done);

      expect(Object.isFrozen(task)).toBe(true);
    });

    it('should let the same factory be started more than once', async () => {
      const factory = vi.fn(done);
      const task = createStreamingTask<string>('repeat', factory);
      const scope = { id: 'repeat', signal: new AbortController().signal };

      const first = await task.operationFactory(scope);
      const second = await task.operationFactory(scope);

      expect(factory).toHaveBeenCalledTimes(2);
      expect(first).toEqual({ publishable: 'done', next: [] });
      expect(second).toEqual(first);
    });

    it('should reject an already-created promise', () => {
      const running = done();

      expect(() => createStreamingTask('eager', running)).toThrow(InvalidOperationError);
      expect(() => createStreamingTask('eager', running)).toThrow(
        "Cannot create task 'eager' from an already-created promise. " +
          'Provide a factory function that returns a fresh promise.',
      );
    });

    it('should reject an empty id', () => {
      expect(() => createStreamingTask('', done)).toThrow('Task id must be a non-empty string.');
    });

    it('should reject a negative or non-finite timeout', () => {
      expect(() => createStreamingTask('neg', done, -1)).toThrow(InvalidOperationError);
      expect(() => createStreamingTask('nan', done, Number.NaN)).toThrow(
        "Task 'nan' timeout must be a non-negative number of milliseconds.",
      );
      expect(() => createStreamingTask('inf', done, Number.POSITIVE_INFINITY)).toThrow(InvalidOperationError);
    });

    it('should reject a timeout longer than a timer can hold', () => {
      expect(createStreamingTask('max', done, MAX_TASK_TIMEOUT_MS).timeoutMs).toBe(2_147_483_647);
      expect(() => createStreamingTask('over', done, MAX_TASK_TIMEOUT_MS + 1)).toThrow(InvalidOperationError);
      expect(() => createStreamingTask('big', done, 3_000_000_000)).toThrow(
        "Task 'big' timeout of 3000000000ms exceeds the maximum of 2147483647ms.",
      );
    });
  });

  describe('taskResult', () => {
    it('should carry a publishable value and follow-up tasks', () => {
      const child = createStreamingTask('child', done);

      const result = taskResult('parent', [child]);

      expect(result.publishable).toBe('parent');
      expect(result.next).toEqual([child]);
    });

    it('should leave publishable out when nothing is published', () => {
      const result = taskResult<string>();

      expect(result).toEqual({ next: [] });
      expect('publishable' in result).toBe(false);
    });

    it('should keep falsy publishable values', () => {
      expect(taskResult(0)).toEqual({ publishable: 0, next: [] });
      expect(taskResult('')).toEqual({ publishable: '', next: [] });
    });
  });

  describe('isTaskResult', () => {
    it('should accept objects with a next array', () => {
      expect(isTaskResult({ next: [] })).toBe(true);
      expect(isTaskResult({ publishable: 1, next: [] })).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isTaskResult(null)).toBe(false);
      expect(isTaskResult('done')).toBe(false);
      expect(isTaskResult({ publishable: 1 })).toBe(false);
      expect(isTaskResult({ next: 'nope' })).toBe(false);
    });
  });

  describe('isPromiseLike', () => {
    it('should recognise promises and thenables', () => {
      expect(isPromiseLike(Promise.resolve(1))).toBe(true);
      expect(isPromiseLike({ then: () => {} })).toBe(true);
    });

    it('should not treat plain functions or values as promises', () => {
      expect(isPromiseLike(done)).toBe(false);
      expect(isPromiseLike(undefined)).toBe(false);
      expect(isPromiseLike({ then: 1 })).toBe(false);
    });
  });
});
