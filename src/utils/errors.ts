/**
 * Standardized error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger';

/**
 * Base error class with exit code
 */
export abstract class XExportError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, XExportError.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: missing bearer token, malformed month, non-numeric options
 */
export class InvalidInputError extends XExportError {
  readonly code = 1;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  static fromMissingToken(): InvalidInputError {
    return new InvalidInputError(
      'Provide a Bearer token via --bearer-token or X_BEARER_TOKEN env var.',
      'An OAuth 2.0 app-only Bearer token is required for every API call'
    );
  }

  static fromInvalidMonth(value: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid month: "${value}". Expected format: YYYY-MM (e.g., 2024-02)`,
      'Month must be a four-digit year and a two-digit month between 01 and 12'
    );
  }

  static fromInvalidNumber(flag: string, value: string, expected = 'an integer'): InvalidInputError {
    return new InvalidInputError(`${flag} must be ${expected}, got: ${value}`);
  }
}

/**
 * API request error (exit code 4)
 * Triggered by: non-throttle HTTP status, network failure, undecodable body
 */
export class ApiRequestError extends XExportError {
  readonly code = 4;
  readonly endpoint: string;
  readonly status?: number;

  constructor(message: string, endpoint: string, status?: number, details?: string) {
    super(message, details);
    this.endpoint = endpoint;
    this.status = status;
    Object.setPrototypeOf(this, ApiRequestError.prototype);
  }

  static fromStatus(endpoint: string, status: number, body: string): ApiRequestError {
    return new ApiRequestError(`Request to ${endpoint} failed: ${status} ${body}`.trim(), endpoint, status);
  }

  static fromTransport(endpoint: string, cause: unknown): ApiRequestError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ApiRequestError(
      `Network error while requesting ${endpoint}: ${reason}`,
      endpoint,
      undefined,
      'Check your connection and the API base URL'
    );
  }

  static fromDecode(endpoint: string, reason: string): ApiRequestError {
    return new ApiRequestError(
      `Unexpected response body from ${endpoint}: ${reason}`,
      endpoint,
      200,
      'The API returned a body that is not the expected JSON document'
    );
  }
}

/**
 * Throttle retry budget exhausted (exit code 4)
 * Only raised when a retry cap is configured; the default is to retry forever
 */
export class ThrottleLimitError extends XExportError {
  readonly code = 4;
  readonly endpoint: string;
  readonly attempts: number;

  constructor(endpoint: string, attempts: number) {
    super(
      `Still throttled after ${attempts} retries: ${endpoint}`,
      'Raise --max-throttle-retries or try again once the rate limit window resets'
    );
    this.endpoint = endpoint;
    this.attempts = attempts;
    Object.setPrototypeOf(this, ThrottleLimitError.prototype);
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof XExportError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof XExportError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
