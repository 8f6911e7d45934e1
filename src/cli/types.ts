/**
 * CLI argument parsing and validation types
 */

import type { TimeWindow } from '../x/types.js';

/**
 * Raw options as commander hands them over
 */
export interface CliOptions {
  bearerToken?: string;
  usernames: string[];
  month: string;
  includeReplies?: boolean;
  includeRetweets?: boolean;
  outdir: string;
  perPage: string;
  verbose?: boolean;
  maxThrottleRetries?: string;
  timeoutMs?: string;
}

/**
 * Validated run configuration
 */
export interface ExportConfig {
  bearerToken: string;
  baseUrl?: string;
  usernames: string[];
  /** Normalized YYYY-MM */
  month: string;
  window: TimeWindow;
  outDir: string;
  includeReplies: boolean;
  includeRetweets: boolean;
  /** max_results per request, 10-100 */
  perPage: number;
  verbose: boolean;
  maxThrottleRetries?: number;
  timeoutMs: number;
}
