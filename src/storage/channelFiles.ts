import fs from 'fs';
import path from 'path';

const INVALID_FILENAME_CHARS = /[^A-Za-z0-9._-]/g;

export const MESSAGES_FILE = 'messages.json';
export const SUMMARY_FILE = 'summary.txt';
export const METADATA_FILE = 'metadata.json';

/**
 * Directory name for a channel key: anything outside `[A-Za-z0-9._-]`
 * becomes `_`.
 */
export function safeFilename(key: string): string {
  const cleaned = key.replace(INVALID_FILENAME_CHARS, '_');
  return cleaned || 'channel';
}

export function channelDir(root: string, channelKey: string): string {
  return path.join(root, safeFilename(channelKey));
}

/**
 * Write through a sibling temp file and rename, so readers never see a
 * half-written file after a crash.
 */
export function writeFileAtomic(filePath: string, contents: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, contents, 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

export function readMetadata(filePath: string): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    console.warn(`⚠️ Ignoring metadata that is not a JSON object: ${filePath}`);
  } catch (error) {
    console.warn(`⚠️ Unable to parse metadata file ${filePath}:`, error);
  }
  return null;
}
