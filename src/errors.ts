export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ChatPlatformError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ChatPlatformError';
  }
}

export interface LLMRequestErrorOptions {
  status?: number;
  /** Raw `Retry-After` header value, seconds or an HTTP-date. */
  retryAfter?: string;
  cause?: unknown;
}

/**
 * Failure talking to an LLM provider. Providers translate their SDK errors
 * into this shape so the retry policy can stay provider-agnostic.
 */
export class LLMRequestError extends Error {
  readonly status?: number;
  readonly retryAfter?: string;

  constructor(message: string, options: LLMRequestErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'LLMRequestError';
    this.status = options.status;
    this.retryAfter = options.retryAfter;
  }

  /** Connection failures (no status), 5xx and 429 are worth retrying. */
  get transient(): boolean {
    if (this.status === undefined) return true;
    return this.status >= 500 || this.status === 429;
  }
}

export class EmptySummaryError extends Error {
  constructor(groupId: string) {
    super(`LLM returned an empty summary for ${groupId}`);
    this.name = 'EmptySummaryError';
  }
}

export class BatchResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatchResponseError';
  }
}
