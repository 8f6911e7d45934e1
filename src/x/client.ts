/**
 * Minimal X API v2 client
 * - Bearer token auth on every request
 * - 429/503 are retried after backoff(); unbounded unless maxThrottleRetries is set
 * - Any other non-2xx status, network failure or non-JSON body throws ApiRequestError
 */

import { getLogger } from '../utils/logger.js';
import { backoff, DEFAULT_BACKOFF_SECONDS, sleep } from '../utils/backoff.js';
import type { SleepFn } from '../utils/backoff.js';
import { ApiRequestError, ThrottleLimitError } from '../utils/errors.js';

export const DEFAULT_API_BASE_URL = 'https://api.x.com/2';
export const DEFAULT_TIMEOUT_MS = 60000;

const THROTTLE_STATUSES = new Set([429, 503]);

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | undefined>;

export interface XApiClientOptions {
  bearerToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Cap on consecutive throttle retries per request (default: unbounded) */
  maxThrottleRetries?: number;
  backoffSeconds?: number;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

export function isThrottleStatus(status: number): boolean {
  return THROTTLE_STATUSES.has(status);
}

export class XApiClient {
  private readonly bearerToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxThrottleRetries?: number;
  private readonly backoffSeconds: number;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: SleepFn;

  constructor(options: XApiClientOptions) {
    this.bearerToken = options.bearerToken;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxThrottleRetries = options.maxThrottleRetries;
    this.backoffSeconds = options.backoffSeconds ?? DEFAULT_BACKOFF_SECONDS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleepFn = options.sleep ?? sleep;
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * GET a JSON document. The same request is re-sent after every throttle
   * response, so callers never observe 429/503.
   */
  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    const logger = getLogger();
    const url = this.buildUrl(path, params);
    let throttleRetries = 0;

    for (;;) {
      logger.debug(`GET ${url}`);

      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers: { Authorization: `Bearer ${this.bearerToken}` },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        throw ApiRequestError.fromTransport(path, error);
      }

      if (isThrottleStatus(response.status)) {
        if (this.maxThrottleRetries !== undefined && throttleRetries >= this.maxThrottleRetries) {
          throw new ThrottleLimitError(path, throttleRetries);
        }
        throttleRetries++;
        await response.body?.cancel();
        logger.info(`Rate limited (${response.status}) on ${path}; backing off...`);
        await backoff(response.headers, {
          defaultSeconds: this.backoffSeconds,
          sleep: this.sleepFn,
        });
        continue;
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw ApiRequestError.fromTransport(path, error);
      }

      if (!response.ok) {
        throw ApiRequestError.fromStatus(path, response.status, text);
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw ApiRequestError.fromDecode(path, reason);
      }
    }
  }
}
