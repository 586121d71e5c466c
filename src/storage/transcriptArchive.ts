import fs from 'fs';
import path from 'path';
import {
  MESSAGES_FILE,
  METADATA_FILE,
  SUMMARY_FILE,
  channelDir,
  readMetadata,
  safeFilename,
  writeFileAtomic,
} from './channelFiles';

export interface ChannelDescriptor {
  teamId: string;
  channelId: string;
  channelName: string;
  displayName: string;
}

/**
 * Recursively sort object keys so the stored JSON is stable across runs.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeysDeep);
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * Raw transcripts and latest summaries, one directory per channel.
 */
export class TranscriptArchive {
  constructor(private root: string) {
    fs.mkdirSync(root, { recursive: true });
  }

  saveMessages(channelKey: string, posts: Record<string, unknown>[]): string {
    const filePath = path.join(channelDir(this.root, channelKey), MESSAGES_FILE);
    writeFileAtomic(filePath, JSON.stringify(sortKeysDeep(posts), null, 2));
    return filePath;
  }

  saveSummary(channelKey: string, summary: string): string {
    const filePath = path.join(channelDir(this.root, channelKey), SUMMARY_FILE);
    writeFileAtomic(filePath, summary);
    return filePath;
  }

  /** Merges channel names into metadata.json, keeping the watermark. */
  saveDescriptor(channelKey: string, descriptor: ChannelDescriptor): void {
    const filePath = path.join(channelDir(this.root, channelKey), METADATA_FILE);
    const metadata = readMetadata(filePath) ?? {};
    metadata.team_id = descriptor.teamId;
    metadata.channel_id = descriptor.channelId;
    metadata.channel_name = descriptor.channelName;
    metadata.display_name = descriptor.displayName;
    writeFileAtomic(filePath, JSON.stringify(metadata, null, 2));
  }

  loadDescriptor(channelKey: string): ChannelDescriptor {
    const dirName = safeFilename(channelKey);
    const metadata = readMetadata(path.join(this.root, dirName, METADATA_FILE)) ?? {};
    const channelName = readString(metadata, 'channel_name') ?? dirName;
    return {
      teamId: readString(metadata, 'team_id') ?? '',
      channelId: readString(metadata, 'channel_id') ?? dirName,
      channelName,
      displayName:
        readString(metadata, 'display_name') ??
        (dirName.replace(/[_-]/g, ' ').trim() || dirName),
    };
  }

  loadSummary(channelKey: string): string {
    const filePath = path.join(channelDir(this.root, channelKey), SUMMARY_FILE);
    return fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8') : '';
  }

  /** Stored posts in chronological order; unreadable files give []. */
  loadMessages(channelKey: string): Record<string, unknown>[] {
    const filePath = path.join(channelDir(this.root, channelKey), MESSAGES_FILE);
    if (!fs.existsSync(filePath)) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      console.warn(`⚠️ Unable to parse messages file ${filePath}:`, error);
      return [];
    }
    if (!Array.isArray(parsed)) return [];

    const posts = parsed.filter(
      (item): item is Record<string, unknown> =>
        typeof item === 'object' && item !== null && !Array.isArray(item)
    );
    const createAt = (post: Record<string, unknown>): number =>
      typeof post.create_at === 'number' ? post.create_at : 0;
    return posts.sort((a, b) => createAt(a) - createAt(b));
  }

  listChannels(): string[] {
    return fs
      .readdirSync(this.root, { withFileTypes: true })
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }
}
