import { describe, it, expect } from 'vitest';
import {
  TRUNCATION_MARKER,
  approximateTokens,
  buildSegments,
  promptOverhead,
  segmentTokenBudget,
  truncateLine,
} from '../src/batching/segmenter';

const budget = { contextWindowTokens: 2048, maxOutputTokens: 512, promptOverheadTokens: 0 };

describe('approximateTokens', () => {
  it('rounds up at four characters per token', () => {
    expect(approximateTokens('')).toBe(0);
    expect(approximateTokens('abcd')).toBe(1);
    expect(approximateTokens('abcde')).toBe(2);
  });
});

describe('promptOverhead', () => {
  it('counts only the fixed template text', () => {
    expect(promptOverhead('abcd{{GROUP_NAME}}efgh')).toBe(2);
  });
});

describe('buildSegments', () => {
  it('keeps a short conversation in one segment', () => {
    expect(buildSegments(['a', 'b'], budget)).toEqual(['a\nb']);
  });

  it('packs lines greedily within the token budget', () => {
    const lines = Array.from({ length: 150 }, (_, i) => `${i}`.padEnd(100, 'x'));
    const segments = buildSegments(lines, budget);

    expect(segments.map(segment => segment.split('\n').length)).toEqual([60, 60, 30]);
    for (const segment of segments) {
      expect(approximateTokens(segment)).toBeLessThanOrEqual(segmentTokenBudget(budget));
    }
    expect(segments.join('\n')).toBe(lines.join('\n'));
  });

  it('rejects a budget with no room for conversation', () => {
    expect(() =>
      buildSegments(['x'], { contextWindowTokens: 100, maxOutputTokens: 60, promptOverheadTokens: 40 })
    ).toThrow(RangeError);
  });

  it('truncates a single oversized line to fit', () => {
    const line = `#1 [2024-01-01 10:00] alice: ${'y'.repeat(10000)}`;
    const [segment] = buildSegments([line], budget);
    expect(approximateTokens(segment)).toBeLessThanOrEqual(1536);
    expect(segment.startsWith(`#1 [2024-01-01 10:00] alice: ${TRUNCATION_MARKER}`)).toBe(true);
  });
});

describe('truncateLine', () => {
  const header = '#1 [2024-01-01 10:00] alice: ';

  it('leaves lines within the limit alone', () => {
    expect(truncateLine(`${header}hi`, 100)).toBe(`${header}hi`);
  });

  it('keeps the header and the tail of the message', () => {
    const line = `${header}${'x'.repeat(1000)}END`;
    const truncated = truncateLine(line, 50);

    expect(truncated).toHaveLength(200);
    expect(truncated.startsWith(`${header}${TRUNCATION_MARKER}`)).toBe(true);
    expect(truncated.endsWith('xEND')).toBe(true);
  });

  it('drops into the header when even it is too long', () => {
    const truncated = truncateLine(`${header}${'z'.repeat(40)}`, 2);
    expect(truncated).toBe(`${TRUNCATION_MARKER}zzzzzzz`);
  });
});
