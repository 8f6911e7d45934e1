import { XApiClient } from './client';
import { resolveUserId } from './users';
import { createFakeApi, createRecordingSleep, userLookup } from '../test-utils/fake-api';

describe('resolveUserId', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return data.id on 200', async () => {
    const api = createFakeApi([userLookup('2244994945', 'testuser')]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    await expect(resolveUserId(client, 'testuser')).resolves.toBe('2244994945');
    expect(api.requests[0].url.pathname).toBe('/2/users/by/username/testuser');
  });

  it('should strip a leading @ from the handle', async () => {
    const api = createFakeApi([userLookup('1', 'testuser')]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    await resolveUserId(client, '@testuser');

    expect(api.requests[0].url.pathname).toBe('/2/users/by/username/testuser');
  });

  it('should return undefined when the 200 body has no id', async () => {
    const api = createFakeApi([{ body: { errors: [{ title: 'Not Found Error' }] } }]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    await expect(resolveUserId(client, 'ghost')).resolves.toBeUndefined();
  });

  it('should retry the same lookup after throttling', async () => {
    const api = createFakeApi([
      { status: 429, headers: { 'retry-after': '4' } },
      userLookup('99', 'testuser'),
    ]);
    const { sleep, delays } = createRecordingSleep();
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch, sleep });

    await expect(resolveUserId(client, 'testuser')).resolves.toBe('99');
    expect(delays).toEqual([4000]);
    expect(api.requests.map((r) => r.url.pathname)).toEqual([
      '/2/users/by/username/testuser',
      '/2/users/by/username/testuser',
    ]);
  });

  it('should warn and return undefined on other statuses without retrying', async () => {
    const api = createFakeApi([{ status: 404, rawBody: 'missing' }]);
    const client = new XApiClient({ bearerToken: 'test-secret', fetch: api.fetch });

    await expect(resolveUserId(client, 'ghost')).resolves.toBeUndefined();
    expect(api.requests).toHaveLength(1);
    expect(warnSpy).toHaveBeenCalledWith(
      '[x-month-export] WARNING: Failed to look up @ghost: Request to /users/by/username/ghost failed: 404 missing'
    );
  });
});
