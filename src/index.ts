/**
 * @module
 * The main entry point for task-stream-pool. It exports the pool, the dynamic
 * streaming iterator and the helpers around them for streaming the results of
 * a self-expanding set of async tasks as they complete.
 */

// Task descriptors, results and their constructors
export * from './task';

// Bounded pool with per-task timeouts and completion-order reporting
export * from './pool';

// Consumer-facing async iterable that re-feeds spawned tasks under a global cap
export * from './iterator';

// Error hierarchy and cancellation helpers
export * from './errors';

// Logger contract, no-op and console loggers
export * from './logger';

// Defaults and option resolution
export * from './config';

// Tagged payload union published by search streams
export * from './streamable';

// Server-sent-event framing for published values
export * from './event-stream';
