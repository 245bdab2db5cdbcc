/**
 * @module
 * The payloads a scholarly search stream publishes. Every value carries a
 * `type` tag so consumers can switch on it.
 */

export interface Publication {
  title: string;
  authors?: string[];
  year?: number;
  venue?: string;
  citations?: number;
  url?: string;
}

export interface Author {
  scholarId: string;
  name: string;
  affiliation?: string;
  interests?: string[];
  citedBy?: number;
  publications?: Publication[];
  /** Filled in by a summarisation task, `null` until then. */
  summary?: string | null;
}

export interface StreamSetAuthorList {
  readonly type: 'set:author:list';
  readonly payload: Author[];
}

export interface StreamSetPublicationList {
  readonly type: 'set:publication:list';
  readonly payload: Publication[];
}

export interface StreamUpdateAuthor {
  readonly type: 'update:author';
  readonly payload: Author;
}

export interface StreamUpdatePublication {
  readonly type: 'update:publication';
  readonly payload: Publication;
}

export type Streamable =
  | StreamSetAuthorList
  | StreamSetPublicationList
  | StreamUpdateAuthor
  | StreamUpdatePublication;

export type StreamableType = Streamable['type'];

/** One published value tagged with the stream it belongs to. */
export interface StreamPacket {
  readonly streamId: string;
  readonly content: Streamable;
}

export const setAuthorList = (payload: Author[]): StreamSetAuthorList => ({ type: 'set:author:list', payload });

export const setPublicationList = (payload: Publication[]): StreamSetPublicationList => ({
  type: 'set:publication:list',
  payload,
});

export const updateAuthor = (payload: Author): StreamUpdateAuthor => ({ type: 'update:author', payload });

export const updatePublication = (payload: Publication): StreamUpdatePublication => ({
  type: 'update:publication',
  payload,
});

const STREAMABLE_TYPES: ReadonlySet<string> = new Set<StreamableType>([
  'set:author:list',
  'set:publication:list',
  'update:author',
  'update:publication',
]);

/**
 * Checks the tag and that list variants carry an array. Payload fields are
 * not validated.
 */
export function isStreamable(value: unknown): value is Streamable {
  if (typeof value !== 'object' || value === null || !('type' in value) || !('payload' in value)) return false;

  const { type, payload } = value;
  if (typeof type !== 'string' || !STREAMABLE_TYPES.has(type)) return false;
  if (typeof payload !== 'object' || payload === null) return false;

  return type.startsWith('set:') === Array.isArray(payload);
}
