import { Post, SummaryContext } from '../types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatMinute(timestamp: number): string {
  const d = new Date(timestamp);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
}

/** Human-readable UTC time for prompts and fallback text. */
export function formatTimestamp(timestamp: number | undefined): string {
  if (timestamp === undefined || !Number.isFinite(timestamp)) return 'Unknown';
  return `${formatMinute(timestamp)} UTC`;
}

/**
 * One transcript line: `#<index> [<time>] <author>: <text>`.
 */
export function formatPost(post: Post, index: number): string {
  const author = post.userName || post.userId || 'unknown';
  return `#${index} [${formatMinute(post.createAt)}] ${author}: ${post.message.trim()}`;
}

export function formatPosts(posts: Post[]): string[] {
  return posts.map((post, i) => formatPost(post, i + 1));
}

export function timestampRange(posts: Pick<Post, 'createAt'>[]): { startAt?: number; endAt?: number } {
  if (posts.length === 0) return {};
  const stamps = posts.map(post => post.createAt);
  return { startAt: Math.min(...stamps), endAt: Math.max(...stamps) };
}

export function buildContext(groupName: string, posts: Pick<Post, 'createAt'>[]): SummaryContext {
  const { startAt, endAt } = timestampRange(posts);
  return Object.freeze({
    groupName,
    startDate: formatTimestamp(startAt),
    endDate: formatTimestamp(endAt),
  });
}

/**
 * Replace every `{{KEY}}` with its value; unknown keys render empty.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_, key: string) => values[key] ?? '');
}
