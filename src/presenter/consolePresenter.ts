import { ChannelSummary } from '../types';

/**
 * Text block for one digest as the console shows it.
 */
export function renderSummary(summary: ChannelSummary): string {
  const title = summary.displayName || summary.channelName;
  const unread = summary.unreadCount > 0 ? ` (${summary.unreadCount} unread)` : '';
  return [`━━ ${title}${unread}`, summary.summary.trim()].join('\n');
}

export function presentSummaries(summaries: readonly ChannelSummary[]): void {
  for (const summary of summaries) {
    console.log(`\n${renderSummary(summary)}`);
  }
}
