export type ChannelKind = 'direct' | 'group' | 'public' | 'private';

export interface Channel {
  teamId: string;
  id: string;
  name: string;
  displayName: string;
  kind: ChannelKind;
  mentionCount: number;
  unreadCount: number;
  lastViewedAt: number;
  lastPostAt: number;
  highlighted: boolean;
}

export interface Post {
  id: string;
  userId: string;
  userName?: string;
  message: string;
  createAt: number;
  raw: Record<string, unknown>;
}

export interface ResolvedChannel {
  channel: Channel;
  posts: Post[];
}

export interface SummaryContext {
  readonly groupName: string;
  readonly startDate: string;
  readonly endDate: string;
}

export interface ChannelSummary {
  readonly teamId: string;
  readonly channelId: string;
  readonly channelName: string;
  readonly displayName: string;
  readonly unreadCount: number;
  readonly summary: string;
}

export type SummarySource = 'batch' | 'single' | 'segmented' | 'fallback';

export interface SummaryOutcome {
  summary: string;
  source: SummarySource;
}

/**
 * One conversation handed to the orchestrator. `lines` are already formatted
 * with `formatPost`; the timestamps feed the fallback text.
 */
export interface SummaryGroup {
  groupId: string;
  context: SummaryContext;
  lines: string[];
  messageCount: number;
  startAt?: number;
  endAt?: number;
}
