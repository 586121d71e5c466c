import { describe, it, expect, afterEach, vi } from 'vitest';
import { MattermostClient, displayNameOf } from '../src/chat/mattermostClient';
import { ChatPlatformError } from '../src/errors';

interface Call {
  url: string;
  init?: RequestInit;
}

function stubFetch(body: unknown, status = 200): Call[] {
  const calls: Call[] = [];
  vi.stubGlobal('fetch', async (input: string | URL | Request, init?: RequestInit) => {
    calls.push({ url: String(input), init });
    return new Response(JSON.stringify(body), { status });
  });
  return calls;
}

function client(): MattermostClient {
  return new MattermostClient({
    baseUrl: 'https://chat.test/api/v4',
    token: 'test-token',
    requestTimeoutMs: 1000,
  });
}

describe('MattermostClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches posts since a timestamp with the bearer token', async () => {
    const calls = stubFetch({
      order: ['b', 'a'],
      posts: {
        a: { id: 'a', create_at: 1, message: 'first', user_id: 'u1' },
        b: { id: 'b', create_at: 2, message: 'second', user_id: 'u2' },
        junk: 5,
      },
    });

    const list = await client().getPosts('c 1', { since: 999 });

    expect(calls[0].url).toBe('https://chat.test/api/v4/channels/c%201/posts?since=999');
    expect(new Headers(calls[0].init?.headers).get('authorization')).toBe('Bearer test-token');
    expect(list.order).toEqual(['b', 'a']);
    expect(Object.keys(list.posts)).toEqual(['a', 'b']);
    expect(list.posts.a.message).toBe('first');
  });

  it('pages the initial fetch', async () => {
    const calls = stubFetch({ order: [], posts: {} });
    await client().getPosts('c1', { perPage: 50 });
    expect(calls[0].url).toBe('https://chat.test/api/v4/channels/c1/posts?page=0&per_page=50');
  });

  it('lists channel memberships of a team', async () => {
    const calls = stubFetch([{ channel_id: 'c1' }]);
    expect(await client().listChannelMembers('t1')).toEqual([{ channel_id: 'c1' }]);
    expect(calls[0].url).toBe('https://chat.test/api/v4/users/me/teams/t1/channels/members?page=0&per_page=200');
  });

  it('pages through memberships until a short page', async () => {
    const urls: string[] = [];
    vi.stubGlobal('fetch', async (input: string | URL | Request) => {
      const url = new URL(String(input));
      urls.push(url.search);
      const count = url.searchParams.get('page') === '0' ? 200 : 1;
      const members = Array.from({ length: count }, (_, i) => ({ channel_id: `c${url.searchParams.get('page')}-${i}` }));
      return new Response(JSON.stringify(members));
    });

    const members = await client().listChannelMembers('t1');

    expect(members).toHaveLength(201);
    expect(members[200]).toEqual({ channel_id: 'c1-0' });
    expect(urls).toEqual(['?page=0&per_page=200', '?page=1&per_page=200']);
  });

  it('reports HTTP errors with their status', async () => {
    stubFetch({ message: 'nope' }, 401);
    const failing = client().listTeams();

    await expect(failing).rejects.toBeInstanceOf(ChatPlatformError);
    await expect(failing).rejects.toMatchObject({ status: 401 });
  });

  it('rejects a list endpoint that answers with an object', async () => {
    stubFetch({ not: 'a list' });
    await expect(client().listTeams()).rejects.toThrow('did not return a list');
  });

  it('resolves display names in one POST', async () => {
    const calls = stubFetch([
      { id: 'u1', nickname: 'Ally', username: 'alice' },
      { id: 'u2', first_name: 'Bob', last_name: 'Stone', username: 'bob' },
      { id: 'u3', username: 'cat' },
    ]);

    const names = await client().resolveUserDisplayNames(['u1', 'u2', 'u3', 'u1']);

    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe('["u1","u2","u3"]');
    expect(names).toEqual({ u1: 'Ally', u2: 'Bob Stone', u3: 'cat' });
  });

  it('skips the request when there is nobody to resolve', async () => {
    const calls = stubFetch([]);
    expect(await client().resolveUserDisplayNames([])).toEqual({});
    expect(calls).toHaveLength(0);
  });
});

describe('displayNameOf', () => {
  it('falls back to the id when nothing else is set', () => {
    expect(displayNameOf({ id: 'u1', nickname: '  ' })).toBe('u1');
  });
});
