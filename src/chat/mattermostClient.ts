import { MattermostConfig } from '../config';
import { ChatPlatformError } from '../errors';
import {
  ChatPlatform,
  GetPostsOptions,
  PostList,
  RawChannel,
  RawChannelMember,
  RawPost,
  RawTeam,
} from './types';

interface RawUser {
  id: string;
  username?: string;
  nickname?: string;
  first_name?: string;
  last_name?: string;
}

type Query = Record<string, string | number>;

const MEMBERS_PAGE_SIZE = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRawPost(post: Record<string, unknown>): RawPost {
  return {
    ...post,
    id: typeof post.id === 'string' ? post.id : undefined,
    user_id: typeof post.user_id === 'string' ? post.user_id : undefined,
    message: typeof post.message === 'string' ? post.message : undefined,
    create_at: typeof post.create_at === 'number' ? post.create_at : undefined,
  };
}

/**
 * Nickname first, then full name, then username; what the Mattermost web
 * client shows under the default display setting.
 */
export function displayNameOf(user: RawUser): string {
  const nickname = user.nickname?.trim();
  if (nickname) return nickname;
  const fullName = [user.first_name, user.last_name]
    .map(part => part?.trim() ?? '')
    .filter(Boolean)
    .join(' ');
  return fullName || user.username || user.id;
}

/**
 * Lightweight Mattermost REST v4 client for the current user.
 */
export class MattermostClient implements ChatPlatform {
  private inFlight = new Set<AbortController>();

  constructor(private config: Pick<MattermostConfig, 'baseUrl' | 'token' | 'requestTimeoutMs'>) {}

  private url(path: string, query?: Query): string {
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request(method: 'GET' | 'POST', path: string, query?: Query, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await fetch(this.url(path, query), {
        method,
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          Accept: 'application/json',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new ChatPlatformError(
          `Mattermost ${method} ${path} returned ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
          response.status
        );
      }
      return await response.json();
    } catch (error) {
      if (error instanceof ChatPlatformError) throw error;
      throw new ChatPlatformError(`Mattermost ${method} ${path} failed: ${String(error)}`);
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  private async getList<T>(path: string, query?: Query): Promise<T[]> {
    const payload = await this.request('GET', path, query);
    if (!Array.isArray(payload)) {
      throw new ChatPlatformError(`Mattermost GET ${path} did not return a list`);
    }
    return payload;
  }

  listTeams(): Promise<RawTeam[]> {
    return this.getList<RawTeam>('/users/me/teams');
  }

  listChannels(teamId: string): Promise<RawChannel[]> {
    return this.getList<RawChannel>(`/users/me/teams/${encodeURIComponent(teamId)}/channels`, {
      include_deleted: 'false',
    });
  }

  async listChannelMembers(teamId: string): Promise<RawChannelMember[]> {
    const path = `/users/me/teams/${encodeURIComponent(teamId)}/channels/members`;
    const members: RawChannelMember[] = [];
    // A short page is the last one
    for (let page = 0; ; page++) {
      const batch = await this.getList<RawChannelMember>(path, { page, per_page: MEMBERS_PAGE_SIZE });
      members.push(...batch);
      if (batch.length < MEMBERS_PAGE_SIZE) return members;
    }
  }

  async getPosts(channelId: string, options: GetPostsOptions = {}): Promise<PostList> {
    const query: Query = {};
    if (options.since !== undefined) query.since = options.since;
    if (options.perPage !== undefined) {
      query.page = 0;
      query.per_page = options.perPage;
    }

    const payload = await this.request('GET', `/channels/${encodeURIComponent(channelId)}/posts`, query);
    if (!isRecord(payload)) {
      throw new ChatPlatformError(`Mattermost returned a malformed post list for ${channelId}`);
    }

    const order = Array.isArray(payload.order)
      ? payload.order.filter((id): id is string => typeof id === 'string')
      : [];
    const posts: Record<string, RawPost> = {};
    if (isRecord(payload.posts)) {
      for (const [id, post] of Object.entries(payload.posts)) {
        if (isRecord(post)) posts[id] = toRawPost(post);
      }
    }
    return { order, posts };
  }

  async resolveUserDisplayNames(userIds: string[]): Promise<Record<string, string>> {
    const unique = [...new Set(userIds.filter(Boolean))];
    if (unique.length === 0) return {};

    const users = await this.request('POST', '/users/ids', undefined, unique);
    const names: Record<string, string> = {};
    for (const user of Array.isArray(users) ? users : []) {
      if (isRecord(user) && typeof user.id === 'string') {
        names[user.id] = displayNameOf({
          id: user.id,
          username: typeof user.username === 'string' ? user.username : undefined,
          nickname: typeof user.nickname === 'string' ? user.nickname : undefined,
          first_name: typeof user.first_name === 'string' ? user.first_name : undefined,
          last_name: typeof user.last_name === 'string' ? user.last_name : undefined,
        });
      }
    }
    return names;
  }

  close(): void {
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }
}
