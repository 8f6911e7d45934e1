/**
 * X API v2 timeline types
 * Posts are kept as opaque JSON records; only id and created_at are read.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A post as returned by the API, passed through untouched
 */
export type Post = JsonObject;

/**
 * Half-open UTC interval [start, end)
 */
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Decoded timeline response
 */
export interface Page {
  items: Post[];
  /** meta.next_token */
  cursor?: string;
  /** meta.result_count (0 when absent) */
  resultCount: number;
  meta: JsonObject;
  /** Side tables (users, media, referenced tweets) for this page only */
  includes: JsonObject;
}

export type StopReason =
  | 'empty-page'
  | 'short-page'
  | 'past-window-start'
  | 'no-cursor'
  | 'repeated-cursor'
  | 'request-failed'
  | 'throttle-limit';

export interface FetchWindowOptions {
  includeReplies?: boolean; // default true
  includeRetweets?: boolean; // default true
  /** Page size cap, clamped to 1-100 (default 100) */
  maxResults?: number;
  /** Overwrite this file with an IncrementalSnapshot after every page */
  incrementalSavePath?: string;
  /** Clock for snapshot timestamps */
  now?: () => Date;
}

export interface FetchResult {
  /** Every post received, in request order, before window filtering */
  posts: Post[];
  pages: number;
  stopReason: StopReason;
}

/**
 * Type guard: plain JSON object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
