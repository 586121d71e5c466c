/**
 * Wire shapes of the Mattermost v4 endpoints the digest reads. Only the
 * fields it looks at are typed; flags arrive as booleans or as the strings
 * "true"/"false" depending on the server version.
 */
export type FlagValue = boolean | string | undefined;

export interface RawTeam {
  id: string;
  name?: string;
  display_name?: string;
}

export interface RawChannel {
  id: string;
  team_id?: string;
  name?: string;
  display_name?: string;
  type?: string;
  delete_at?: number;
  last_post_at?: number;
  total_msg_count?: number;
  highlighted?: FlagValue;
  is_highlighted?: FlagValue;
}

export interface RawNotifyProps {
  muted?: FlagValue;
  mute?: FlagValue;
  mark_unread?: string;
  highlight?: FlagValue;
  [key: string]: unknown;
}

export interface RawChannelMember {
  channel_id: string;
  last_viewed_at?: number;
  msg_count?: number;
  mention_count?: number;
  urgent_mention_count?: number;
  muted?: FlagValue;
  highlighted?: FlagValue;
  is_highlighted?: FlagValue;
  notify_props?: RawNotifyProps;
}

export interface RawPost {
  id?: string;
  user_id?: string;
  message?: string;
  create_at?: number;
  [key: string]: unknown;
}

export interface PostList {
  order: string[];
  posts: Record<string, RawPost>;
}

export interface GetPostsOptions {
  since?: number;
  perPage?: number;
}

/**
 * What the digest needs from the chat platform.
 */
export interface ChatPlatform {
  listTeams(): Promise<RawTeam[]>;
  listChannels(teamId: string): Promise<RawChannel[]>;
  listChannelMembers(teamId: string): Promise<RawChannelMember[]>;
  getPosts(channelId: string, options?: GetPostsOptions): Promise<PostList>;
  resolveUserDisplayNames(userIds: string[]): Promise<Record<string, string>>;
  close(): void;
}
