/**
 * On-disk document shapes
 * - ExportPayload: posts_<username>_<YYYY-MM>.json, written once per user
 * - IncrementalSnapshot: posts_<username>_<YYYY-MM>.partial.json, overwritten every page
 */

import type { JsonObject, Post } from '../x/types.js';

export interface ExportPayload {
  username: string;
  user_id: string;
  /** YYYY-MM */
  month: string;
  start_time: string;
  end_time: string;
  count: number;
  posts: Post[];
}

/**
 * Progress journal written after each page. Not used for resumption.
 */
export interface IncrementalSnapshot {
  user_id: string;
  start_time: string;
  end_time: string;
  /** 1-based index of the page just fetched */
  page: number;
  count_so_far: number;
  /** meta of the latest page */
  meta: JsonObject;
  /** includes of the latest page only; earlier pages' side tables are not merged */
  includes: JsonObject;
  fetched_at: string;
  posts_so_far: Post[];
}
