/**
 * User timeline pagination for a single time window
 * - Walks /users/:id/tweets with pagination_token until a stop condition fires
 * - Keeps every page it receives, including the one that triggers the stop
 * - Stop checks run in a fixed order: empty page, short page, paged past the
 *   window start, missing or repeated cursor
 * - Optionally overwrites an incremental snapshot after every page
 */

import { getLogger } from '../utils/logger.js';
import { ApiRequestError, ThrottleLimitError, XExportError } from '../utils/errors.js';
import { writeSnapshot } from '../export/snapshot.js';
import type { IncrementalSnapshot } from '../export/types.js';
import type { QueryParams, XApiClient } from './client.js';
import { parseCreatedAt } from './filter.js';
import { isJsonObject } from './types.js';
import type { FetchResult, FetchWindowOptions, Page, Post, StopReason, TimeWindow } from './types.js';
import { toApiTimestamp } from './window.js';

export const MAX_RESULTS_LIMIT = 100;

export const TWEET_FIELDS = [
  'id',
  'text',
  'created_at',
  'public_metrics',
  'lang',
  'possibly_sensitive',
  'source',
  'in_reply_to_user_id',
  'referenced_tweets',
  'attachments',
  'entities',
] as const;

export const EXPANSIONS = ['author_id', 'attachments.media_keys', 'referenced_tweets.id'] as const;

export const USER_FIELDS = ['id', 'name', 'username', 'verified', 'created_at'] as const;

export const MEDIA_FIELDS = ['media_key', 'type', 'url', 'width', 'height', 'alt_text'] as const;

interface FetchState {
  accumulated: Post[];
  cursor?: string;
  seenCursors: Set<string>;
  pageIndex: number;
}

export function clampMaxResults(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return MAX_RESULTS_LIMIT;
  }
  return Math.min(Math.max(Math.trunc(value), 1), MAX_RESULTS_LIMIT);
}

export function buildTimelineParams(
  window: TimeWindow,
  options: FetchWindowOptions,
  cursor?: string
): QueryParams {
  const excludes: string[] = [];
  if (options.includeReplies === false) {
    excludes.push('replies');
  }
  if (options.includeRetweets === false) {
    excludes.push('retweets');
  }

  return {
    start_time: toApiTimestamp(window.start),
    end_time: toApiTimestamp(window.end),
    max_results: clampMaxResults(options.maxResults),
    'tweet.fields': TWEET_FIELDS.join(','),
    expansions: EXPANSIONS.join(','),
    'user.fields': USER_FIELDS.join(','),
    'media.fields': MEDIA_FIELDS.join(','),
    exclude: excludes.length > 0 ? excludes.join(',') : undefined,
    pagination_token: cursor,
  };
}

/**
 * Decode a timeline response body. Absent data, meta or includes read as empty;
 * absent meta.result_count reads as 0. Non-object entries in data are dropped.
 */
export function decodePage(endpoint: string, body: unknown): Page {
  if (!isJsonObject(body)) {
    throw ApiRequestError.fromDecode(endpoint, 'response is not a JSON object');
  }

  const data = body.data ?? [];
  if (!Array.isArray(data)) {
    throw ApiRequestError.fromDecode(endpoint, 'data is not an array');
  }

  const items: Post[] = [];
  let skipped = 0;
  for (const item of data) {
    if (isJsonObject(item)) {
      items.push(item);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    getLogger().warn(`Skipped ${skipped} non-object entr${skipped === 1 ? 'y' : 'ies'} in data from ${endpoint}`);
  }

  const meta = isJsonObject(body.meta) ? body.meta : {};
  const includes = isJsonObject(body.includes) ? body.includes : {};
  const resultCount = typeof meta.result_count === 'number' ? meta.result_count : 0;
  const cursor =
    typeof meta.next_token === 'string' && meta.next_token.length > 0 ? meta.next_token : undefined;

  return { items, cursor, resultCount, meta, includes };
}

/**
 * Earliest parseable created_at on the page, or undefined if none parse
 */
export function oldestCreatedAt(items: readonly Post[]): Date | undefined {
  let oldest: Date | undefined;
  for (const item of items) {
    const createdAt = parseCreatedAt(item);
    if (createdAt && (!oldest || createdAt.getTime() < oldest.getTime())) {
      oldest = createdAt;
    }
  }
  return oldest;
}

export interface StopDecision {
  reason: StopReason;
  message: string;
}

/**
 * First stop condition that applies to a page, or undefined to keep paging
 */
export function evaluateStop(
  page: Page,
  requested: number,
  window: TimeWindow,
  seenCursors: ReadonlySet<string>
): StopDecision | undefined {
  const got = page.items.length;

  if (got === 0 || page.resultCount === 0) {
    return { reason: 'empty-page', message: 'Empty page or result_count==0.' };
  }

  if (got < requested) {
    return {
      reason: 'short-page',
      message: `Page returned fewer (${got}) than max_results (${requested}).`,
    };
  }

  const oldest = oldestCreatedAt(page.items);
  if (oldest && oldest.getTime() < window.start.getTime()) {
    return {
      reason: 'past-window-start',
      message: `Oldest post on this page (${oldest.toISOString()}) < start_time (${window.start.toISOString()}).`,
    };
  }

  if (page.cursor === undefined) {
    return { reason: 'no-cursor', message: 'No next_token present.' };
  }

  if (seenCursors.has(page.cursor)) {
    return {
      reason: 'repeated-cursor',
      message: 'Repeated next_token detected; stopping to avoid loop.',
    };
  }

  return undefined;
}

/**
 * Fetch every page of a user's timeline for the window. Returns the unfiltered
 * accumulation; request failures end the walk early with what was collected.
 */
export async function fetchWindow(
  client: XApiClient,
  userId: string,
  window: TimeWindow,
  options: FetchWindowOptions = {}
): Promise<FetchResult> {
  const logger = getLogger();
  const endpoint = `/users/${encodeURIComponent(userId)}/tweets`;
  const requested = clampMaxResults(options.maxResults);
  const now = options.now ?? (() => new Date());

  const state: FetchState = {
    accumulated: [],
    cursor: undefined,
    seenCursors: new Set<string>(),
    pageIndex: 0,
  };

  for (;;) {
    let page: Page;
    try {
      const body = await client.get(endpoint, buildTimelineParams(window, options, state.cursor));
      page = decodePage(endpoint, body);
    } catch (error) {
      if (!(error instanceof XExportError)) {
        throw error;
      }
      logger.error(`Fetch failed: ${error.message}`);
      return {
        posts: state.accumulated,
        pages: state.pageIndex,
        stopReason: error instanceof ThrottleLimitError ? 'throttle-limit' : 'request-failed',
      };
    }

    state.pageIndex++;
    logger.info(
      `Fetched ${page.items.length} posts (page ${state.pageIndex}). next_token=${page.cursor ?? 'none'} result_count=${page.resultCount}`
    );

    state.accumulated.push(...page.items);

    if (options.incrementalSavePath) {
      const snapshot: IncrementalSnapshot = {
        user_id: userId,
        start_time: toApiTimestamp(window.start),
        end_time: toApiTimestamp(window.end),
        page: state.pageIndex,
        count_so_far: state.accumulated.length,
        meta: page.meta,
        includes: page.includes,
        fetched_at: now().toISOString(),
        posts_so_far: state.accumulated,
      };
      await writeSnapshot(options.incrementalSavePath, snapshot);
    }

    const decision = evaluateStop(page, requested, window, state.seenCursors);
    if (decision) {
      logger.stop(decision.message);
      return { posts: state.accumulated, pages: state.pageIndex, stopReason: decision.reason };
    }

    // evaluateStop only continues when a fresh cursor is present
    if (page.cursor !== undefined) {
      state.seenCursors.add(page.cursor);
      state.cursor = page.cursor;
    }
  }
}
