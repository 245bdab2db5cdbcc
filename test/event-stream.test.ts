import { describe, it, expect } from 'vitest';
import { formatEventFrame, toEventFrames, type EventFrame } from '../src/event-stream';
import { createDynamicIterator } from '../src/iterator';
import { taskResult } from '../src/task';
import { setAuthorList, updateAuthor, type Streamable } from '../src/streamable';

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of source) {
    values.push(value);
  }
  return values;
}

async function* fromArray<T>(values: T[]): AsyncGenerator<T> {
  for (const value of values) {
    yield value;
  }
}

describe('Event stream framing (event-stream.ts)', () => {
  describe('toEventFrames', () => {
    it('should emit one message frame per value followed by a finish frame', async () => {
      const frames = await collect(toEventFrames(fromArray([{ n: 1 }, { n: 2 }])));

      expect(frames).toEqual([
        { event: 'message', data: '{"n":1}' },
        { event: 'message', data: '{"n":2}' },
        { event: 'finish', data: '' },
      ]);
    });

    it('should emit only the finish frame for an empty source', async () => {
      expect(await collect(toEventFrames(fromArray<string>([])))).toEqual([{ event: 'finish', data: '' }]);
    });

    it('should use a custom serializer', async () => {
      const frames = await collect(toEventFrames(fromArray([1, 2]), (value) => `#${value}`));

      expect(frames.map((frame) => frame.data)).toEqual(['#1', '#2', '']);
    });

    it('should close the source when the consumer stops early', async () => {
      let closed = false;
      async function* source(): AsyncGenerator<number> {
        try {
          yield 1;
          yield 2;
        } finally {
          closed = true;
        }
      }

      const frames: EventFrame[] = [];
      for await (const frame of toEventFrames(source())) {
        frames.push(frame);
        break;
      }

      expect(frames).toEqual([{ event: 'message', data: '1' }]);
      expect(closed).toBe(true);
    });

    it('should frame a streaming iterator end to end', async () => {
      const iterator = createDynamicIterator<Streamable>([
        [
          'authors',
          async () =>
            taskResult<Streamable>(setAuthorList([{ scholarId: 'a1', name: 'First' }]), []),
        ],
      ]);

      const frames = await collect(toEventFrames(iterator));

      expect(frames).toEqual([
        {
          event: 'message',
          data: '{"type":"set:author:list","payload":[{"scholarId":"a1","name":"First"}]}',
        },
        { event: 'finish', data: '' },
      ]);
    });

    it('should stream follow-up updates after the list they belong to', async () => {
      const iterator = createDynamicIterator<Streamable>([
        [
          'authors',
          async () =>
            taskResult<Streamable>(setAuthorList([{ scholarId: 'a1', name: 'First' }]), [
              {
                id: 'summary:a1',
                operationFactory: async () =>
                  taskResult<Streamable>(updateAuthor({ scholarId: 'a1', name: 'First', summary: 'short' })),
                timeoutMs: 1_000,
                createdAt: 0,
              },
            ]),
        ],
      ]);

      const frames = await collect(toEventFrames(iterator));

      expect(frames.map((frame) => frame.event)).toEqual(['message', 'message', 'finish']);
      expect(frames[1]?.data).toBe(
        '{"type":"update:author","payload":{"scholarId":"a1","name":"First","summary":"short"}}',
      );
    });
  });

  describe('formatEventFrame', () => {
    it('should write the event and data lines terminated by a blank line', () => {
      expect(formatEventFrame({ event: 'message', data: '{"n":1}' })).toBe('event: message\ndata: {"n":1}\n\n');
    });

    it('should write an empty data line for the finish frame', () => {
      expect(formatEventFrame({ event: 'finish', data: '' })).toBe('event: finish\ndata: \n\n');
    });

    it('should split multi-line data into several data lines', () => {
      expect(formatEventFrame({ event: 'message', data: 'a\nb\r\nc' })).toBe(
        'event: message\ndata: a\ndata: b\ndata: c\n\n',
      );
    });
  });
});
