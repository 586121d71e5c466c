import path from 'path';
import { METADATA_FILE, channelDir, readMetadata, writeFileAtomic } from './channelFiles';

export const WATERMARK_KEY = 'last_processed_timestamp';

export interface WatermarkLookup {
  get(channelKey: string): number | undefined;
}

/**
 * Per-channel "last processed" timestamps kept in `metadata.json`.
 *
 * File access is synchronous, so a read-modify-write cannot interleave with
 * another one inside this process; that is the lock the advance check
 * relies on.
 */
export class WatermarkStore implements WatermarkLookup {
  constructor(private root: string) {}

  private metadataPath(channelKey: string): string {
    return path.join(channelDir(this.root, channelKey), METADATA_FILE);
  }

  get(channelKey: string): number | undefined {
    const metadata = readMetadata(this.metadataPath(channelKey));
    const value = metadata?.[WATERMARK_KEY];
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
      return value;
    }
    return undefined;
  }

  /**
   * Move the watermark forward. Returns false, leaving the file untouched,
   * when `timestamp` is not past the stored value.
   */
  advance(channelKey: string, timestamp: number): boolean {
    if (!Number.isInteger(timestamp) || timestamp < 0) {
      console.warn(`⚠️ Refusing invalid watermark ${timestamp} for ${channelKey}`);
      return false;
    }

    const filePath = this.metadataPath(channelKey);
    const metadata = readMetadata(filePath) ?? {};
    const current = metadata[WATERMARK_KEY];
    if (typeof current === 'number' && timestamp <= current) {
      console.debug(`Watermark for ${channelKey} stays at ${current} (candidate ${timestamp})`);
      return false;
    }

    metadata[WATERMARK_KEY] = timestamp;
    writeFileAtomic(filePath, JSON.stringify(metadata, null, 2));
    return true;
  }
}
