/**
 * A simulated scholar search: one task lists authors, then spawns a summary
 * task per author. Frames are printed as they would be written to an
 * `text/event-stream` response.
 */
import { randomUUID } from 'node:crypto';
import {
  createConsoleLogger,
  createDynamicIterator,
  createStreamingTask,
  formatEventFrame,
  setAuthorList,
  taskResult,
  toEventFrames,
  updateAuthor,
  withLogContext,
  type Author,
  type Streamable,
  type TaskScope,
} from '../src';

const sleep = (ms: number, signal: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

const authors: Author[] = [
  { scholarId: 'a1', name: 'Ada Example', interests: ['graphs'], summary: null },
  { scholarId: 'a2', name: 'Bo Sample', interests: ['compilers'], summary: null },
];

const summarise = (author: Author) =>
  createStreamingTask<Streamable>(
    `summary:${author.scholarId}`,
    async ({ signal }: TaskScope) => {
      await sleep(50 + Math.random() * 100, signal);
      return taskResult<Streamable>(updateAuthor({ ...author, summary: `Works on ${author.interests?.join(', ')}.` }));
    },
    5_000,
  );

async function main(): Promise<void> {
  const logger = withLogContext(createConsoleLogger({ level: 'debug' }), { requestId: randomUUID() });

  const iterator = createDynamicIterator<Streamable>(
    [
      [
        'search:authors',
        async ({ signal }) => {
          await sleep(20, signal);
          return taskResult<Streamable>(setAuthorList(authors), authors.map(summarise));
        },
        10_000,
      ],
    ],
    { maxConcurrentTasks: 2, maxTotalTasks: 10, logger, signal: AbortSignal.timeout(30_000) },
  );

  for await (const frame of toEventFrames(iterator)) {
    process.stdout.write(formatEventFrame(frame));
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
