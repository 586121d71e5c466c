import { ChatPlatform } from '../chat/types';
import { LLMProvider } from '../llm/types';
import { buildContext, formatPosts, timestampRange } from '../batching/formatting';
import { UnreadResolver, collectSnapshot } from '../resolver/unreadResolver';
import { TranscriptArchive } from '../storage/transcriptArchive';
import { WatermarkStore } from '../storage/watermarkStore';
import { SummaryOrchestrator } from '../summarizer/orchestrator';
import { Channel, ChannelSummary, Post, SummaryGroup } from '../types';
import { DisplayNameCache } from './displayNameCache';
import { SummaryQueue } from './summaryQueue';

export interface DigestServiceDeps {
  chat: ChatPlatform;
  llm: LLMProvider;
  orchestrator: SummaryOrchestrator;
  archive: TranscriptArchive;
  watermarks: WatermarkStore;
  queue: SummaryQueue<ChannelSummary>;
  initialFetchLimit?: number;
  names?: DisplayNameCache;
}

export interface CycleStats {
  channels: number;
  published: number;
  fallbacks: number;
  failed: number;
}

interface PreparedChannel {
  channel: Channel;
  posts: Post[];
  group: SummaryGroup;
}

export function toChannelSummary(channel: Channel, postCount: number, summary: string): ChannelSummary {
  return {
    teamId: channel.teamId,
    channelId: channel.id,
    channelName: channel.name,
    displayName: channel.displayName,
    unreadCount: channel.unreadCount || postCount,
    summary,
  };
}

/**
 * One poll cycle end to end: resolve unread channels, persist raw posts,
 * summarise, persist summaries, advance watermarks, publish.
 */
export class DigestService {
  private resolver: UnreadResolver;
  private names: DisplayNameCache;

  constructor(private deps: DigestServiceDeps) {
    this.resolver = new UnreadResolver(deps.chat, { initialFetchLimit: deps.initialFetchLimit });
    this.names = deps.names ?? new DisplayNameCache(ids => deps.chat.resolveUserDisplayNames(ids));
  }

  private async prepare(channel: Channel, posts: Post[]): Promise<PreparedChannel> {
    const names = await this.names.resolve(posts.map(post => post.userId));
    const named = posts.map(post => ({ ...post, userName: names[post.userId] }));

    this.deps.archive.saveMessages(channel.id, named.map(post => post.raw));
    this.deps.archive.saveDescriptor(channel.id, {
      teamId: channel.teamId,
      channelId: channel.id,
      channelName: channel.name,
      displayName: channel.displayName,
    });

    return {
      channel,
      posts: named,
      group: {
        groupId: channel.id,
        context: buildContext(channel.displayName, named),
        lines: formatPosts(named),
        messageCount: named.length,
        ...timestampRange(named),
      },
    };
  }

  async runCycle(): Promise<CycleStats> {
    const { archive, watermarks, queue, orchestrator } = this.deps;
    const stats: CycleStats = { channels: 0, published: 0, fallbacks: 0, failed: 0 };

    const snapshot = await collectSnapshot(this.deps.chat);
    const resolved = await this.resolver.resolve(snapshot, watermarks);
    stats.channels = resolved.length;
    if (resolved.length === 0) {
      console.log('📭 No unread conversations');
      return stats;
    }

    const prepared: PreparedChannel[] = [];
    for (const { channel, posts } of resolved) {
      try {
        prepared.push(await this.prepare(channel, posts));
      } catch (error) {
        stats.failed++;
        console.error(`❌ Failed to store posts for ${channel.displayName}:`, error);
      }
    }

    const outcomes = await orchestrator.summariseMany(prepared.map(entry => entry.group));

    for (const { channel, posts, group } of prepared) {
      const outcome = outcomes.get(group.groupId);
      if (!outcome) continue;
      try {
        archive.saveSummary(channel.id, outcome.summary);
        const newest = posts[posts.length - 1].createAt;
        if (!watermarks.advance(channel.id, newest)) {
          console.warn(`⚠️ Watermark for ${channel.displayName} not advanced to ${newest}`);
        }
        queue.push(toChannelSummary(channel, posts.length, outcome.summary));
        stats.published++;
        if (outcome.source === 'fallback') stats.fallbacks++;
        console.log(`📝 Updated summary for ${channel.displayName} via ${outcome.source} (${posts.length} messages)`);
      } catch (error) {
        stats.failed++;
        console.error(`❌ Failed to persist summary for ${channel.displayName}:`, error);
      }
    }

    return stats;
  }

  /** Summaries already on disk, for presenting before the first cycle ends. */
  loadExistingSummaries(): ChannelSummary[] {
    const { archive } = this.deps;
    const summaries: ChannelSummary[] = [];
    for (const key of archive.listChannels()) {
      const summary = archive.loadSummary(key);
      if (!summary.trim()) continue;
      const descriptor = archive.loadDescriptor(key);
      summaries.push({
        teamId: descriptor.teamId,
        channelId: descriptor.channelId,
        channelName: descriptor.channelName,
        displayName: descriptor.displayName,
        unreadCount: 0,
        summary,
      });
    }
    return summaries;
  }

  close(): void {
    this.deps.chat.close();
    this.deps.llm.close();
  }
}
