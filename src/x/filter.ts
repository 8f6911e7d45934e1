import type { Post, TimeWindow } from './types.js';

// ISO date-time without Z or a numeric offset
const OFFSETLESS_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * created_at as a Date, or undefined when missing or unparseable. A date-time
 * without an offset is read as UTC, not host-local time.
 */
export function parseCreatedAt(post: Post): Date | undefined {
  const raw = post.created_at;
  if (typeof raw !== 'string' || raw.length === 0) {
    return undefined;
  }
  const ms = Date.parse(OFFSETLESS_DATE_TIME.test(raw) ? `${raw}Z` : raw);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

/**
 * Keep posts with start <= created_at < end. Posts without a usable timestamp
 * are kept.
 */
export function filterInWindow(posts: readonly Post[], window: TimeWindow): Post[] {
  const startMs = window.start.getTime();
  const endMs = window.end.getTime();

  return posts.filter((post) => {
    const createdAt = parseCreatedAt(post);
    if (!createdAt) {
      return true;
    }
    const t = createdAt.getTime();
    return startMs <= t && t < endMs;
  });
}
