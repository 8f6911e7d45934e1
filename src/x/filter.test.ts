import { filterInWindow, parseCreatedAt } from './filter';
import { monthBounds } from './window';
import { makePost } from '../test-utils/fake-api';

describe('filterInWindow', () => {
  const window = monthBounds(2024, 2);

  it('should keep posts inside [start, end) and preserve order', () => {
    const posts = [
      makePost('3', '2024-02-20T10:00:00.000Z'),
      makePost('2', '2024-02-01T00:00:00.000Z'),
      makePost('1', '2024-02-29T23:59:59.000Z'),
    ];

    expect(filterInWindow(posts, window).map((p) => p.id)).toEqual(['3', '2', '1']);
  });

  it('should drop posts at the exclusive end and before the start', () => {
    const posts = [
      makePost('late', '2024-03-01T00:00:00.000Z'),
      makePost('early', '2024-01-31T23:59:59.000Z'),
      makePost('in', '2024-02-10T12:00:00.000Z'),
    ];

    expect(filterInWindow(posts, window).map((p) => p.id)).toEqual(['in']);
  });

  it('should never remove posts without a parseable timestamp', () => {
    const posts = [
      makePost('missing'),
      makePost('garbage', 'not-a-date'),
      makePost('empty', ''),
      makePost('numeric', undefined, { created_at: 12345 }),
    ];

    expect(filterInWindow(posts, window)).toEqual(posts);
  });

  it('should read timestamps without an offset as UTC', () => {
    const posts = [
      makePost('feb', '2024-02-29T23:30:00'),
      makePost('mar', '2024-03-01T00:30:00'),
    ];

    expect(filterInWindow(posts, window).map((p) => p.id)).toEqual(['feb']);
  });

  it('should be idempotent', () => {
    const posts = [
      makePost('a', '2024-01-15T00:00:00.000Z'),
      makePost('b', '2024-02-15T00:00:00.000Z'),
      makePost('c'),
      makePost('d', '2024-03-15T00:00:00.000Z'),
    ];

    const once = filterInWindow(posts, window);
    expect(filterInWindow(once, window)).toEqual(once);
    expect(once.map((p) => p.id)).toEqual(['b', 'c']);
  });

  it('should pass other fields through untouched', () => {
    const post = makePost('x', '2024-02-02T00:00:00.000Z', {
      public_metrics: { like_count: 3 },
      entities: { hashtags: [{ tag: 'test' }] },
    });

    expect(filterInWindow([post], window)[0]).toBe(post);
  });
});

describe('parseCreatedAt', () => {
  it('should parse API timestamps', () => {
    expect(parseCreatedAt(makePost('1', '2024-02-03T04:05:06.000Z'))?.toISOString()).toBe(
      '2024-02-03T04:05:06.000Z'
    );
  });

  it('should treat a missing offset as UTC', () => {
    expect(parseCreatedAt(makePost('1', '2024-02-29T23:30:00'))?.toISOString()).toBe(
      '2024-02-29T23:30:00.000Z'
    );
  });

  it('should honor an explicit offset', () => {
    expect(parseCreatedAt(makePost('1', '2024-02-29T23:30:00-05:00'))?.toISOString()).toBe(
      '2024-03-01T04:30:00.000Z'
    );
  });

  it('should return undefined for unparseable values', () => {
    expect(parseCreatedAt(makePost('1', 'yesterday'))).toBeUndefined();
    expect(parseCreatedAt(makePost('1'))).toBeUndefined();
  });
});
