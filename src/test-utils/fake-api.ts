/**
 * In-process stand-in for the X API: serves queued responses through a
 * fetch-compatible function and records every request.
 */

import type { FetchFn } from '../x/client.js';
import type { JsonObject, Post } from '../x/types.js';

export interface FakeResponse {
  status?: number;
  /** Serialized as JSON unless rawBody is given */
  body?: unknown;
  rawBody?: string;
  headers?: Record<string, string>;
  /** Reject the fetch instead of responding */
  networkError?: string;
}

export interface RecordedRequest {
  url: URL;
  authorization: string | null;
}

export interface FakeApi {
  fetch: FetchFn;
  requests: RecordedRequest[];
}

export function createFakeApi(responses: FakeResponse[]): FakeApi {
  const queue = [...responses];
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = async (input, init) => {
    const headers = new Headers(init?.headers);
    requests.push({ url: new URL(input), authorization: headers.get('authorization') });

    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${input}`);
    }
    if (next.networkError) {
      throw new Error(next.networkError);
    }

    const text = next.rawBody ?? JSON.stringify(next.body ?? {});
    return new Response(text, {
      status: next.status ?? 200,
      headers: { 'content-type': 'application/json', ...next.headers },
    });
  };

  return { fetch, requests };
}

export interface RecordingSleep {
  sleep: (ms: number) => Promise<void>;
  delays: number[];
}

export function createRecordingSleep(): RecordingSleep {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export function makePost(id: string, createdAt?: string, extra: Post = {}): Post {
  const post: Post = { id, text: `post ${id}`, ...extra };
  if (createdAt !== undefined) {
    post.created_at = createdAt;
  }
  return post;
}

/**
 * Timeline body with result_count matching data unless overridden
 */
export function timelinePage(
  posts: Post[],
  nextToken?: string,
  overrides: { resultCount?: number; includes?: JsonObject } = {}
): FakeResponse {
  const meta: JsonObject = { result_count: overrides.resultCount ?? posts.length };
  if (nextToken !== undefined) {
    meta.next_token = nextToken;
  }
  const body: JsonObject = { data: posts, meta };
  if (overrides.includes) {
    body.includes = overrides.includes;
  }
  return { status: 200, body };
}

export function userLookup(id: string, username: string): FakeResponse {
  return { status: 200, body: { data: { id, name: username, username } } };
}
