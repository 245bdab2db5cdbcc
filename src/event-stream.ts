/**
 * @module
 * Server-sent-event framing for a stream of published values: one `message`
 * frame per value, then a `finish` frame once the source is exhausted.
 * Writing the frames to an HTTP response is left to the caller.
 */

export type EventName = 'message' | 'finish';

export interface EventFrame {
  readonly event: EventName;
  readonly data: string;
}

/**
 * Wraps `source` as event frames. If the consumer stops early, `source` is
 * returned too, so a `DynamicStreamingIterator` shuts its pool down.
 *
 * @param serialize Turns one value into the frame's `data`. Defaults to `JSON.stringify`.
 */
export async function* toEventFrames<T>(
  source: AsyncIterable<T>,
  serialize: (value: T) => string = (value) => JSON.stringify(value),
): AsyncGenerator<EventFrame, void, undefined> {
  for await (const value of source) {
    yield { event: 'message', data: serialize(value) };
  }
  yield { event: 'finish', data: '' };
}

/**
 * Serialises one frame to the `text/event-stream` wire format. Multi-line
 * data becomes one `data:` line per line.
 *
 * @example
 * ```typescript
 * formatEventFrame({ event: 'finish', data: '' }); // 'event: finish\ndata: \n\n'
 * ```
 */
export function formatEventFrame(frame: EventFrame): string {
  const dataLines = frame.data.split(/\r\n|\r|\n/).map((line) => `data: ${line}`);
  return `event: ${frame.event}\n${dataLines.join('\n')}\n\n`;
}
