import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, noopLogger, withLogContext } from '../src/logger';

const createSink = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('Logging (logger.ts)', () => {
  it('should discard everything with the no-op logger', () => {
    expect(() => noopLogger.error('ignored', new Error('x'))).not.toThrow();
  });

  describe('createConsoleLogger', () => {
    it('should drop messages below the info level by default', () => {
      const sink = createSink();
      const logger = createConsoleLogger({ sink });

      logger.debug('hidden');
      logger.info('shown', { tasks: 2 });
      logger.error('failed');

      expect(sink.debug).not.toHaveBeenCalled();
      expect(sink.info).toHaveBeenCalledWith('shown', { tasks: 2 });
      expect(sink.error).toHaveBeenCalledWith('failed');
    });

    it('should honour a custom level', () => {
      const sink = createSink();
      const logger = createConsoleLogger({ level: 'warn', sink });

      logger.info('hidden');
      logger.warn('shown');

      expect(sink.info).not.toHaveBeenCalled();
      expect(sink.warn).toHaveBeenCalledWith('shown');
    });

    it('should forward debug messages at the debug level', () => {
      const sink = createSink();
      const logger = createConsoleLogger({ level: 'debug', sink });

      logger.debug('Started task a');

      expect(sink.debug).toHaveBeenCalledWith('Started task a');
    });
  });

  describe('withLogContext', () => {
    it('should append the context fields to every call', () => {
      const sink = createSink();
      const logger = withLogContext(sink, { requestId: 'req-1' });

      logger.info('Streaming completed.', { completed: 3 });
      logger.warn('Task a timed out after 5ms');

      expect(sink.info).toHaveBeenCalledWith('Streaming completed.', { completed: 3 }, { requestId: 'req-1' });
      expect(sink.warn).toHaveBeenCalledWith('Task a timed out after 5ms', { requestId: 'req-1' });
    });
  });
});
