export type Tokenizer = (text: string) => number;

export const CHARS_PER_TOKEN = 4;
export const TRUNCATION_MARKER = '…';

/**
 * Four characters per token, rounded up so the budget is never overrun.
 */
export const approximateTokens: Tokenizer = text => Math.ceil(text.length / CHARS_PER_TOKEN);

export interface SegmentBudget {
  contextWindowTokens: number;
  maxOutputTokens: number;
  promptOverheadTokens: number;
  tokenizer?: Tokenizer;
}

export function segmentTokenBudget(budget: SegmentBudget): number {
  return budget.contextWindowTokens - budget.maxOutputTokens - budget.promptOverheadTokens;
}

/**
 * Token cost of a template's fixed text: every placeholder rendered empty.
 */
export function promptOverhead(template: string, tokenizer: Tokenizer = approximateTokens): number {
  return tokenizer(template.replace(/\{\{[A-Z_]+\}\}/g, ''));
}

/**
 * Shorten a line until it fits `limit` tokens. The `#n [time] author: `
 * header survives; the message loses characters from its start and the
 * kept tail is marked with an ellipsis.
 */
export function truncateLine(line: string, limit: number, tokenizer: Tokenizer = approximateTokens): string {
  if (tokenizer(line) <= limit) return line;

  const match = /^(#\d+ \[[^\]]*\] [^:]*: )([\s\S]*)$/.exec(line);
  const header = match ? match[1] : '';
  const body = match ? match[2] : line;

  // Jump close to the answer before walking one character at a time
  let keep = Math.min(body.length, Math.max(0, limit * CHARS_PER_TOKEN - header.length - TRUNCATION_MARKER.length));
  const render = (n: number): string => `${header}${TRUNCATION_MARKER}${body.slice(body.length - n)}`;

  while (keep > 0 && tokenizer(render(keep)) > limit) keep--;
  while (keep < body.length && tokenizer(render(keep + 1)) <= limit) keep++;

  const candidate = render(keep);
  if (tokenizer(candidate) <= limit) return candidate;

  // Even the header alone is too long
  let chars = Math.min(line.length, limit * CHARS_PER_TOKEN);
  while (chars > 0 && tokenizer(`${TRUNCATION_MARKER}${line.slice(line.length - chars)}`) > limit) chars--;
  return `${TRUNCATION_MARKER}${line.slice(line.length - chars)}`;
}

/**
 * Split formatted lines into maximal contiguous runs whose joined text fits
 * the per-request token budget.
 */
export function buildSegments(lines: string[], budget: SegmentBudget): string[] {
  const tokenizer = budget.tokenizer ?? approximateTokens;
  const limit = segmentTokenBudget(budget);
  if (limit <= 0) {
    throw new RangeError(
      `No room for conversation: context ${budget.contextWindowTokens}, output ${budget.maxOutputTokens}, overhead ${budget.promptOverheadTokens}`
    );
  }

  const segments: string[] = [];
  let current: string[] = [];

  for (const rawLine of lines) {
    const line = truncateLine(rawLine, limit, tokenizer);
    if (current.length > 0 && tokenizer([...current, line].join('\n')) > limit) {
      segments.push(current.join('\n'));
      current = [];
    }
    current.push(line);
  }

  if (current.length > 0) segments.push(current.join('\n'));
  return segments;
}
