import { writeFile } from 'fs/promises';
import { getLogger } from '../utils/logger.js';
import type { IncrementalSnapshot } from './types.js';

/**
 * Overwrite the snapshot file in place. Failures are logged, never thrown; a
 * torn write is possible if the process dies mid-write.
 */
export async function writeSnapshot(path: string, snapshot: IncrementalSnapshot): Promise<void> {
  try {
    await writeFile(path, JSON.stringify(snapshot, null, 2), 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().warn(`Failed incremental save to ${path}: ${message}`);
  }
}
