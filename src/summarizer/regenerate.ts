import { buildContext, formatPost, timestampRange } from '../batching/formatting';
import { TranscriptArchive } from '../storage/transcriptArchive';
import { Post, SummaryGroup } from '../types';
import { SummaryOrchestrator } from './orchestrator';

export interface RegenerateResult {
  written: number;
  skipped: number;
  fallbacks: number;
}

function storedPost(raw: Record<string, unknown>): Post | null {
  if (typeof raw.create_at !== 'number') return null;
  const message = typeof raw.message === 'string' ? raw.message : '';
  if (!message.trim()) return null;
  return {
    id: typeof raw.id === 'string' ? raw.id : '',
    userId: typeof raw.user_id === 'string' ? raw.user_id : '',
    message,
    createAt: raw.create_at,
    raw,
  };
}

/**
 * Rebuild summary.txt for every archived channel from its stored posts.
 */
export async function regenerateStoredSummaries(
  archive: TranscriptArchive,
  orchestrator: SummaryOrchestrator
): Promise<RegenerateResult> {
  const result: RegenerateResult = { written: 0, skipped: 0, fallbacks: 0 };
  const groups: SummaryGroup[] = [];

  for (const key of archive.listChannels()) {
    const posts = archive
      .loadMessages(key)
      .map(storedPost)
      .filter((post): post is Post => post !== null);
    if (posts.length === 0) {
      console.debug(`Skipping ${key} (no messages)`);
      result.skipped++;
      continue;
    }

    const { displayName } = archive.loadDescriptor(key);
    groups.push({
      groupId: key,
      context: buildContext(displayName, posts),
      lines: posts.map((post, i) => formatPost(post, i + 1)),
      messageCount: posts.length,
      ...timestampRange(posts),
    });
  }

  if (groups.length === 0) return result;

  const outcomes = await orchestrator.summariseMany(groups);
  for (const [key, outcome] of outcomes) {
    const file = archive.saveSummary(key, outcome.summary);
    result.written++;
    if (outcome.source === 'fallback') result.fallbacks++;
    console.log(`📝 Wrote summary via ${outcome.source} to ${file}`);
  }
  return result;
}
