/**
 * Output layout and final JSON writing
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Post, TimeWindow } from '../x/types.js';
import { toApiTimestamp } from '../x/window.js';
import type { ExportPayload } from './types.js';

export const OUTPUT_LAYOUT = {
  PREFIX: 'posts',
  EXPORT_SUFFIX: '.json',
  PARTIAL_SUFFIX: '.partial.json',
} as const;

/**
 * Path of the final export, e.g. <outDir>/posts_jack_2024-02.json
 */
export function getExportPath(outDir: string, username: string, month: string): string {
  return join(outDir, `${OUTPUT_LAYOUT.PREFIX}_${username}_${month}${OUTPUT_LAYOUT.EXPORT_SUFFIX}`);
}

/**
 * Path of the per-page progress snapshot, e.g. <outDir>/posts_jack_2024-02.partial.json
 */
export function getPartialPath(outDir: string, username: string, month: string): string {
  return join(outDir, `${OUTPUT_LAYOUT.PREFIX}_${username}_${month}${OUTPUT_LAYOUT.PARTIAL_SUFFIX}`);
}

export async function ensureOutDir(outDir: string): Promise<void> {
  await mkdir(outDir, { recursive: true });
}

export function buildExportPayload(
  username: string,
  userId: string,
  month: string,
  window: TimeWindow,
  posts: Post[]
): ExportPayload {
  return {
    username,
    user_id: userId,
    month,
    start_time: toApiTimestamp(window.start),
    end_time: toApiTimestamp(window.end),
    count: posts.length,
    posts,
  };
}

export async function saveJson(path: string, value: unknown): Promise<void> {
  await writeFile(path, JSON.stringify(value, null, 2), 'utf-8');
}
