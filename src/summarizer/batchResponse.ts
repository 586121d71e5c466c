import { BatchResponseError } from '../errors';
import { SummaryGroup } from '../types';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Every balanced `{...}` substring, in order of where it starts. Braces
 * inside JSON strings are ignored.
 */
export function* balancedObjects(text: string): Generator<string> {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) {
          yield text.slice(start, i + 1);
          break;
        }
      }
    }
  }
}

/**
 * Parse a model reply that should be a JSON object but may be wrapped in
 * prose or code fences.
 */
export function coerceJsonObject(response: string): JsonObject {
  const trimmed = response.trim();
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (isJsonObject(parsed)) return parsed;
    throw new BatchResponseError('Batch summary response must be a JSON object');
  } catch (error) {
    if (error instanceof BatchResponseError) throw error;
  }

  for (const fragment of balancedObjects(trimmed)) {
    try {
      const parsed: unknown = JSON.parse(fragment);
      if (isJsonObject(parsed)) return parsed;
    } catch {
      continue;
    }
  }
  throw new BatchResponseError('Batch summary response was not valid JSON');
}

export function formatBullets(items: unknown[]): string {
  const bullets: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string') continue;
    const text = item.trim();
    if (!text) continue;
    bullets.push(text.startsWith('-') ? text : `- ${text}`);
  }
  return bullets.join('\n');
}

/**
 * Accepts bullets as an array, a newline-delimited string, or nested under
 * `summary`, `bullets` or `points`.
 */
export function normaliseSummaryValue(value: unknown): string {
  if (Array.isArray(value)) return formatBullets(value);
  if (typeof value === 'string') {
    const lines = value
      .split(/\r?\n/)
      .map(line => line.replace(/^[ \t\-•]+|[ \t\-•]+$/g, ''))
      .filter(line => line.length > 0);
    return formatBullets(lines);
  }
  if (isJsonObject(value)) {
    for (const key of ['summary', 'bullets', 'points']) {
      const nested = normaliseSummaryValue(value[key]);
      if (nested) return nested;
    }
  }
  return '';
}

/**
 * Summaries for the expected ids that the reply actually covered; missing
 * or empty entries are simply absent from the result.
 */
export function parseBatchResponse(response: string, expectedIds: string[]): Map<string, string> {
  const payload = coerceJsonObject(response);
  const summaries = new Map<string, string>();
  for (const id of expectedIds) {
    const summary = normaliseSummaryValue(payload[id]);
    if (summary) summaries.set(id, summary);
  }
  return summaries;
}

export function renderBatchPrompt(groups: SummaryGroup[]): string {
  const sections: string[] = [
    'You will be given multiple chat groups. For each section:',
    '- `group_id` is the identifier you must use as the JSON key.',
    '- `group_name` is the human readable name.',
    '- `date_range` is the relevant time period.',
    '- `conversation` lists the messages.',
    'Return JSON in the form {"<group_id>": ["bullet", ...], ...}.',
    'Do not include any text outside the JSON object.',
  ];

  groups.forEach((group, i) => {
    sections.push(
      `\nGroup ${i + 1}`,
      `group_id: ${group.groupId}`,
      `group_name: ${group.context.groupName}`,
      `date_range: ${group.context.startDate} – ${group.context.endDate}`,
      'conversation:',
      group.lines.join('\n'),
      'END_OF_CONVERSATION'
    );
  });

  return sections.join('\n');
}
