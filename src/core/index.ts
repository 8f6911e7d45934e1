import { getLogger } from '../utils/logger.js';
import {
  buildExportPayload,
  ensureOutDir,
  getExportPath,
  getPartialPath,
  saveJson,
} from '../export/output.js';
import type { XApiClient } from '../x/client.js';
import { filterInWindow } from '../x/filter.js';
import { fetchWindow } from '../x/timeline.js';
import type { StopReason, TimeWindow } from '../x/types.js';
import { resolveUserId } from '../x/users.js';
import { toApiTimestamp } from '../x/window.js';

export interface ExportOptions {
  usernames: string[];
  /** YYYY-MM, used in file names and the payload */
  month: string;
  window: TimeWindow;
  outDir: string;
  includeReplies: boolean;
  includeRetweets: boolean;
  perPage: number;
  now?: () => Date;
}

export interface UserExportResult {
  username: string;
  skipped: boolean;
  userId?: string;
  count: number;
  /** Posts received before window filtering */
  fetched?: number;
  stopReason?: StopReason;
  exportPath?: string;
  partialPath?: string;
}

/**
 * Export each username in turn. Accounts that cannot be resolved are skipped;
 * a fetch that ends early still writes whatever it collected.
 */
export async function orchestrateExport(
  client: XApiClient,
  options: ExportOptions
): Promise<UserExportResult[]> {
  const logger = getLogger();
  const startIso = toApiTimestamp(options.window.start);
  const endIso = toApiTimestamp(options.window.end);
  const results: UserExportResult[] = [];

  await ensureOutDir(options.outDir);

  for (const username of options.usernames) {
    const userId = await resolveUserId(client, username);
    if (!userId) {
      logger.warn(`Skipping @${username}: user id could not be resolved`);
      results.push({ username, skipped: true, count: 0 });
      continue;
    }

    logger.info(`== @${username} (id ${userId}) | ${startIso} to ${endIso} ==`);

    const partialPath = getPartialPath(options.outDir, username, options.month);
    const fetched = await fetchWindow(client, userId, options.window, {
      includeReplies: options.includeReplies,
      includeRetweets: options.includeRetweets,
      maxResults: options.perPage,
      incrementalSavePath: partialPath,
      now: options.now,
    });

    const posts = filterInWindow(fetched.posts, options.window);
    if (posts.length !== fetched.posts.length) {
      logger.debug(`Dropped ${fetched.posts.length - posts.length} post(s) outside ${startIso} to ${endIso}`);
    }

    const exportPath = getExportPath(options.outDir, username, options.month);
    await saveJson(exportPath, buildExportPayload(username, userId, options.month, options.window, posts));
    logger.info(`Saved ${posts.length} posts to ${exportPath}`);

    results.push({
      username,
      skipped: false,
      userId,
      count: posts.length,
      fetched: fetched.posts.length,
      stopReason: fetched.stopReason,
      exportPath,
      partialPath,
    });
  }

  logger.summary(results.map(({ username, count, skipped }) => ({ username, count, skipped })));

  return results;
}
