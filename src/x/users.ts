import { getLogger } from '../utils/logger.js';
import { XExportError } from '../utils/errors.js';
import type { XApiClient } from './client.js';
import { isJsonObject } from './types.js';

/**
 * Look up the numeric id for a handle via /users/by/username/:username.
 * Throttling is retried inside the client. Any other failure is logged and
 * yields undefined, as does a 200 without data.id.
 */
export async function resolveUserId(client: XApiClient, handle: string): Promise<string | undefined> {
  const logger = getLogger();
  const username = handle.replace(/^@/, '');

  let body: unknown;
  try {
    body = await client.get(`/users/by/username/${encodeURIComponent(username)}`);
  } catch (error) {
    if (error instanceof XExportError) {
      logger.warn(`Failed to look up @${username}: ${error.message}`);
      return undefined;
    }
    throw error;
  }

  if (!isJsonObject(body) || !isJsonObject(body.data)) {
    return undefined;
  }

  const id = body.data.id;
  return typeof id === 'string' && id.length > 0 ? id : undefined;
}
