import { InvalidInputError } from '../utils/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../x/client.js';
import { formatMonth, monthBounds, parseMonth } from '../x/window.js';
import type { CliOptions, ExportConfig } from './types.js';

export const TOKEN_ENV_VAR = 'X_BEARER_TOKEN';
export const BASE_URL_ENV_VAR = 'X_API_BASE_URL';

const MIN_PER_PAGE = 10;
const MAX_PER_PAGE = 100;
const MAX_TIMEOUT_MS = 300000; // 300 seconds

function parseNonNegativeInt(flag: string, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw InvalidInputError.fromInvalidNumber(flag, value, 'a non-negative integer');
  }
  return parseInt(trimmed, 10);
}

function parseInteger(flag: string, value: string): number {
  const trimmed = value.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw InvalidInputError.fromInvalidNumber(flag, value);
  }
  return parseInt(trimmed, 10);
}

/**
 * Clamp per-page to the range the timeline endpoint accepts
 */
export function clampPerPage(value: number): number {
  return Math.min(Math.max(value, MIN_PER_PAGE), MAX_PER_PAGE);
}

/**
 * Strip a leading @ and drop blanks and duplicates, preserving order
 */
export function normalizeUsernames(usernames: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of usernames) {
    const name = raw.trim().replace(/^@/, '');
    if (name && !seen.has(name)) {
      seen.add(name);
      result.push(name);
    }
  }
  return result;
}

/**
 * Turn raw CLI options into a validated config. The bearer token falls back to
 * X_BEARER_TOKEN; nothing touches the network before this succeeds.
 */
export function resolveCliConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): ExportConfig {
  const bearerToken = options.bearerToken || env[TOKEN_ENV_VAR];
  if (!bearerToken) {
    throw InvalidInputError.fromMissingToken();
  }

  const yearMonth = parseMonth(options.month);

  const usernames = normalizeUsernames(options.usernames);
  if (usernames.length === 0) {
    throw new InvalidInputError('At least one username is required (--usernames)');
  }

  const timeoutMs =
    options.timeoutMs === undefined
      ? DEFAULT_TIMEOUT_MS
      : Math.min(Math.max(parseNonNegativeInt('--timeout-ms', options.timeoutMs), 1), MAX_TIMEOUT_MS);

  return {
    bearerToken,
    baseUrl: env[BASE_URL_ENV_VAR] || undefined,
    usernames,
    month: formatMonth(yearMonth),
    window: monthBounds(yearMonth.year, yearMonth.month),
    outDir: options.outdir,
    includeReplies: options.includeReplies ?? false,
    includeRetweets: options.includeRetweets ?? false,
    perPage: clampPerPage(parseInteger('--per-page', options.perPage)),
    verbose: options.verbose ?? false,
    maxThrottleRetries:
      options.maxThrottleRetries === undefined
        ? undefined
        : parseNonNegativeInt('--max-throttle-retries', options.maxThrottleRetries),
    timeoutMs,
  };
}
