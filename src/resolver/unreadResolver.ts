import { ChatPlatform, PostList, RawChannel, RawChannelMember, RawTeam } from '../chat/types';
import { WatermarkLookup } from '../storage/watermarkStore';
import { Channel, ChannelKind, Post, ResolvedChannel } from '../types';

export const DEFAULT_INITIAL_FETCH_LIMIT = 50;

export interface UnreadSnapshot {
  teams: RawTeam[];
  channelsByTeam: Record<string, RawChannel[]>;
  membershipsByTeam: Record<string, RawChannelMember[]>;
}

export interface UnreadResolverOptions {
  /** Cap for channels with neither a watermark nor a last-viewed time. */
  initialFetchLimit: number;
}

/**
 * Upstream API versions encode flags as booleans or as "true" strings.
 */
export function isFlagSet(value: unknown): boolean {
  if (value === true) return true;
  return typeof value === 'string' && value.trim().toLowerCase() === 'true';
}

function count(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function channelKind(type: string | undefined): ChannelKind {
  switch (type) {
    case 'D':
      return 'direct';
    case 'G':
      return 'group';
    case 'P':
      return 'private';
    default:
      return 'public';
  }
}

/**
 * Group and public channels only surface when the user was addressed.
 * Public channels count as group-type here: they are multi-party and not
 * direct, while private channels are opt-in and treated like DMs.
 */
export function requiresHighlight(kind: ChannelKind): boolean {
  return kind === 'group' || kind === 'public';
}

export function isChannelMuted(member: RawChannelMember): boolean {
  const props = member.notify_props ?? {};
  return (
    isFlagSet(member.muted) ||
    isFlagSet(props.muted) ||
    isFlagSet(props.mute) ||
    props.mark_unread === 'mention'
  );
}

export function isChannelHighlighted(channel: RawChannel, member: RawChannelMember): boolean {
  return (
    isFlagSet(channel.highlighted) ||
    isFlagSet(channel.is_highlighted) ||
    isFlagSet(member.highlighted) ||
    isFlagSet(member.is_highlighted) ||
    isFlagSet(member.notify_props?.highlight) ||
    count(member.urgent_mention_count) > 0 ||
    count(member.mention_count) > 0
  );
}

export function toChannel(teamId: string, raw: RawChannel, member: RawChannelMember): Channel {
  const totalMessages = count(raw.total_msg_count);
  const viewedMessages = count(member.msg_count);
  return {
    teamId,
    id: raw.id,
    name: raw.name || raw.id,
    displayName: raw.display_name || raw.name || raw.id,
    kind: channelKind(raw.type),
    mentionCount: count(member.mention_count),
    unreadCount: Math.max(0, totalMessages - viewedMessages),
    lastViewedAt: count(member.last_viewed_at),
    lastPostAt: count(raw.last_post_at),
    highlighted: isChannelHighlighted(raw, member),
  };
}

export function hasUnreadActivity(channel: Channel): boolean {
  return (
    channel.lastPostAt > channel.lastViewedAt ||
    channel.unreadCount > 0 ||
    channel.mentionCount > 0
  );
}

/**
 * Channels worth fetching posts for: joined, not archived, not muted, with
 * some evidence of new activity, each channel once. The raw counters can lag behind
 * `last_post_at`, hence the double condition in `hasUnreadActivity`.
 */
export function selectEligibleChannels(snapshot: UnreadSnapshot): Channel[] {
  const eligible: Channel[] = [];
  // DMs and group messages are listed under every team the user is in
  const seen = new Set<string>();

  for (const team of snapshot.teams) {
    const members = new Map<string, RawChannelMember>();
    for (const member of snapshot.membershipsByTeam[team.id] ?? []) {
      members.set(member.channel_id, member);
    }

    for (const raw of snapshot.channelsByTeam[team.id] ?? []) {
      if (seen.has(raw.id)) continue;
      const member = members.get(raw.id);
      if (!member) continue;
      if (count(raw.delete_at) !== 0) continue;
      if (isChannelMuted(member)) continue;

      const channel = toChannel(team.id, raw, member);
      if (!hasUnreadActivity(channel)) continue;
      if (requiresHighlight(channel.kind) && !channel.highlighted) continue;

      seen.add(raw.id);
      eligible.push(channel);
    }
  }

  return eligible;
}

/**
 * Watermark wins over last-viewed once it is further along: it records
 * what was actually summarised.
 */
export function newPostThreshold(channel: Channel, watermark: number | undefined): number {
  return Math.max(watermark ?? 0, channel.lastViewedAt);
}

/**
 * Posts strictly newer than `threshold`, chronological, without blank
 * bodies. With `limit`, only the newest `limit` survive.
 */
export function selectNewPosts(list: PostList, threshold: number, limit?: number): Post[] {
  const ids = list.order.length > 0 ? list.order : Object.keys(list.posts);
  const posts: Post[] = [];

  // `order` is newest-first; walking it backwards keeps equal timestamps chronological
  for (const id of [...ids].reverse()) {
    const raw = list.posts[id];
    if (!raw || typeof raw.create_at !== 'number') continue;
    if (raw.create_at <= threshold) continue;

    const message = typeof raw.message === 'string' ? raw.message : '';
    if (!message.trim()) continue;

    posts.push({
      id: typeof raw.id === 'string' ? raw.id : id,
      userId: typeof raw.user_id === 'string' ? raw.user_id : '',
      message,
      createAt: raw.create_at,
      raw,
    });
  }

  posts.sort((a, b) => a.createAt - b.createAt);
  return limit !== undefined && posts.length > limit ? posts.slice(posts.length - limit) : posts;
}

export async function collectSnapshot(chat: ChatPlatform): Promise<UnreadSnapshot> {
  const teams = await chat.listTeams();
  const snapshot: UnreadSnapshot = { teams, channelsByTeam: {}, membershipsByTeam: {} };

  for (const team of teams) {
    snapshot.channelsByTeam[team.id] = await chat.listChannels(team.id);
    snapshot.membershipsByTeam[team.id] = await chat.listChannelMembers(team.id);
  }

  console.debug(`Fetched ${teams.length} teams`);
  return snapshot;
}

export class UnreadResolver {
  private options: UnreadResolverOptions;

  constructor(private chat: ChatPlatform, options: Partial<UnreadResolverOptions> = {}) {
    this.options = {
      initialFetchLimit: options.initialFetchLimit ?? DEFAULT_INITIAL_FETCH_LIMIT,
    };
  }

  /**
   * Channels with genuinely new posts, freshest conversation first.
   */
  async resolve(snapshot: UnreadSnapshot, watermarks: WatermarkLookup): Promise<ResolvedChannel[]> {
    const resolved: ResolvedChannel[] = [];

    for (const channel of selectEligibleChannels(snapshot)) {
      const threshold = newPostThreshold(channel, watermarks.get(channel.id));

      let posts: Post[];
      try {
        posts = threshold > 0
          ? selectNewPosts(await this.chat.getPosts(channel.id, { since: threshold - 1 }), threshold)
          : selectNewPosts(
              await this.chat.getPosts(channel.id, { perPage: this.options.initialFetchLimit }),
              0,
              this.options.initialFetchLimit
            );
      } catch (error) {
        console.error(`❌ Failed to fetch posts for ${channel.displayName}:`, error);
        continue;
      }

      if (posts.length === 0) {
        console.debug(`No new posts for ${channel.displayName}`);
        continue;
      }
      resolved.push({ channel, posts });
    }

    const newest = (entry: ResolvedChannel): number => entry.posts[entry.posts.length - 1].createAt;
    return resolved.sort(
      (a, b) => newest(b) - newest(a) || a.channel.id.localeCompare(b.channel.id)
    );
  }
}
