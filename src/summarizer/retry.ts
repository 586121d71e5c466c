import { LLMRequestError } from '../errors';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export const MAX_BACKOFF_MS = 10_000;
const MIN_BACKOFF_MS = 500;
const RATE_LIMIT_FLOOR_MS = 1_000;

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Flat delay for 429 responses without a usable Retry-After. */
  rateLimitBackoffMs: number;
}

export interface RetryHooks {
  sleep?: Sleep;
  now?: Clock;
  label?: string;
}

/**
 * `Retry-After` as milliseconds: either delta-seconds or an HTTP-date.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

/** Delay before retry number `attempt` (1-based). */
export function computeRetryDelay(
  error: LLMRequestError,
  attempt: number,
  policy: RetryPolicy,
  now: number = Date.now()
): number {
  if (error.status === 429) {
    const headerDelay = parseRetryAfter(error.retryAfter, now);
    const delay = Math.max(policy.rateLimitBackoffMs, headerDelay ?? 0);
    return delay || RATE_LIMIT_FLOOR_MS;
  }
  return Math.max(MIN_BACKOFF_MS, Math.min(2 ** attempt * 1000, MAX_BACKOFF_MS));
}

/**
 * Run `fn`, retrying transient `LLMRequestError`s. Anything else, including
 * 4xx responses other than 429, propagates on the first failure.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, hooks: RetryHooks = {}): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const now = hooks.now ?? Date.now;
  const label = hooks.label ?? 'LLM request';

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof LLMRequestError) || !error.transient || attempt > policy.maxRetries) {
        throw error;
      }
      const delay = computeRetryDelay(error, attempt, policy, now());
      console.warn(
        `⏳ ${label} failed (${error.status ?? 'no response'}). Retrying in ${(delay / 1000).toFixed(1)}s (${attempt}/${policy.maxRetries})...`
      );
      await wait(delay);
    }
  }
}
