/**
 * Tests for the API client: auth header, throttle retry loop, error mapping
 */

import { XApiClient } from './client';
import { ApiRequestError, ThrottleLimitError } from '../utils/errors';
import { createFakeApi, createRecordingSleep } from '../test-utils/fake-api';

describe('XApiClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should send the bearer token and query params', async () => {
    const api = createFakeApi([{ body: { ok: true } }]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    const body = await client.get('/users/42/tweets', { max_results: 100, exclude: undefined });

    expect(body).toEqual({ ok: true });
    expect(api.requests).toHaveLength(1);
    expect(api.requests[0].authorization).toBe('Bearer test-secret');
    expect(api.requests[0].url.origin + api.requests[0].url.pathname).toBe(
      'https://api.x.com/2/users/42/tweets'
    );
    expect(api.requests[0].url.searchParams.get('max_results')).toBe('100');
    expect(api.requests[0].url.searchParams.has('exclude')).toBe(false);
  });

  it('should honor a custom base URL with a trailing slash', () => {
    const client = new XApiClient({ bearerToken: 'test-secret', baseUrl: 'http://localhost:8080/2/' });

    expect(client.buildUrl('/users/by/username/jack')).toBe('http://localhost:8080/2/users/by/username/jack');
  });

  it('should retry the identical request after 429 and 503', async () => {
    const api = createFakeApi([
      { status: 429, headers: { 'retry-after': '2' } },
      { status: 503 },
      { body: { data: [] } },
    ]);
    const { sleep, delays } = createRecordingSleep();
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch, sleep });

    const body = await client.get('/users/42/tweets', { pagination_token: 'abc' });

    expect(body).toEqual({ data: [] });
    expect(delays).toEqual([2000, 60000]);
    expect(api.requests.map((r) => r.url.toString())).toEqual([
      'https://api.x.com/2/users/42/tweets?pagination_token=abc',
      'https://api.x.com/2/users/42/tweets?pagination_token=abc',
      'https://api.x.com/2/users/42/tweets?pagination_token=abc',
    ]);
  });

  it('should give up after maxThrottleRetries when configured', async () => {
    const api = createFakeApi([{ status: 429 }, { status: 429 }, { status: 429 }]);
    const { sleep, delays } = createRecordingSleep();
    const client = new XApiClient({
      bearerToken: 'test-secret',
      fetch: api.fetch,
      sleep,
      maxThrottleRetries: 2,
    });

    await expect(client.get('/users/42/tweets')).rejects.toBeInstanceOf(ThrottleLimitError);
    expect(api.requests).toHaveLength(3);
    expect(delays).toHaveLength(2);
  });

  it('should map other statuses to ApiRequestError with the body', async () => {
    const api = createFakeApi([{ status: 401, rawBody: 'Unauthorized' }]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    const error = await client.get('/users/42/tweets').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ status: 401, message: 'Request to /users/42/tweets failed: 401 Unauthorized' });
  });

  it('should map network failures to ApiRequestError', async () => {
    const api = createFakeApi([{ networkError: 'ECONNRESET' }]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    await expect(client.get('/users/42/tweets')).rejects.toThrow(
      'Network error while requesting /users/42/tweets: ECONNRESET'
    );
  });

  it('should reject a non-JSON 200 body', async () => {
    const api = createFakeApi([{ rawBody: '<html>' }]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    await expect(client.get('/users/42/tweets')).rejects.toBeInstanceOf(ApiRequestError);
  });
});
