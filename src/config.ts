import path from 'path';
import { ConfigError } from './errors';

export type LLMProviderName = 'groq' | 'openai' | 'anthropic' | 'google';

const PROVIDERS: readonly LLMProviderName[] = ['groq', 'openai', 'anthropic', 'google'];

export interface MattermostConfig {
  baseUrl: string;
  token: string;
  pollIntervalMs: number;
  initialFetchLimit: number;
  requestTimeoutMs: number;
}

export interface LLMConfig {
  provider: LLMProviderName;
  model?: string;
  apiKey: string;
  temperature: number;
  maxOutputTokens: number;
  contextWindowTokens: number;
  requestTimeoutMs: number;
  maxRetries: number;
  interRequestDelayMs: number;
  rateLimitBackoffMs: number;
  batchSize: number;
  maxBatchCharacters: number;
  maxBatches: number;
}

export interface AppConfig {
  mattermost: MattermostConfig;
  llm: LLMConfig;
  storage: {
    dataDir: string;
  };
  ui: {
    refreshIntervalMs: number;
  };
}

type Env = Record<string, string | undefined>;

const API_KEY_ENV: Record<LLMProviderName, string> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
};

function readNumber(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(`${key} must be a number >= ${min}, got "${raw}"`);
  }
  return value;
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const value = readNumber(env, key, fallback, min);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got "${env[key]}"`);
  }
  return value;
}

function requireValue(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function normaliseBaseUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  return trimmed.endsWith('/api/v4') ? trimmed : `${trimmed}/api/v4`;
}

function readProvider(env: Env): LLMProviderName {
  const raw = (env.LLM_PROVIDER || 'groq').trim().toLowerCase();
  const provider = PROVIDERS.find(name => name === raw);
  if (!provider) {
    throw new ConfigError(`Unknown LLM provider: ${raw} (expected one of ${PROVIDERS.join(', ')})`);
  }
  return provider;
}

/**
 * Build the service configuration from environment variables. Everything
 * that would make the first poll cycle fail for certain is rejected here.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const provider = readProvider(env);
  const apiKeyVar = API_KEY_ENV[provider];

  const llm: LLMConfig = {
    provider,
    model: env.LLM_MODEL?.trim() || undefined,
    apiKey: requireValue(env, apiKeyVar),
    temperature: readNumber(env, 'TEMPERATURE', 0.3, 0),
    maxOutputTokens: readInt(env, 'LLM_MAX_TOKENS', 512, 1),
    contextWindowTokens: readInt(env, 'LLM_CONTEXT_WINDOW', 2048, 1),
    requestTimeoutMs: readNumber(env, 'LLM_REQUEST_TIMEOUT_SECONDS', 60, 1) * 1000,
    maxRetries: readInt(env, 'LLM_MAX_RETRIES', 2, 0),
    interRequestDelayMs: readNumber(env, 'LLM_INTER_REQUEST_DELAY_MS', 0, 0),
    rateLimitBackoffMs: readNumber(env, 'LLM_RATE_LIMIT_BACKOFF_SECONDS', 30, 0) * 1000,
    batchSize: readInt(env, 'LLM_BATCH_SIZE', 3, 1),
    maxBatchCharacters: readInt(env, 'LLM_MAX_BATCH_CHARACTERS', 60000, 1024),
    maxBatches: readInt(env, 'LLM_MAX_BATCHES', 0, 0),
  };

  if (llm.maxOutputTokens >= llm.contextWindowTokens) {
    throw new ConfigError(
      `LLM_MAX_TOKENS (${llm.maxOutputTokens}) must be smaller than LLM_CONTEXT_WINDOW (${llm.contextWindowTokens})`
    );
  }

  return {
    mattermost: {
      baseUrl: normaliseBaseUrl(requireValue(env, 'MATTERMOST_URL')),
      token: requireValue(env, 'MATTERMOST_TOKEN'),
      pollIntervalMs: readNumber(env, 'POLL_INTERVAL_SECONDS', 30, 1) * 1000,
      initialFetchLimit: readInt(env, 'INITIAL_FETCH_LIMIT', 50, 1),
      requestTimeoutMs: 30_000,
    },
    llm,
    storage: {
      dataDir: path.resolve(env.DATA_DIR?.trim() || path.join(process.cwd(), 'data')),
    },
    ui: {
      refreshIntervalMs: readNumber(env, 'UI_REFRESH_SECONDS', 5, 1) * 1000,
    },
  };
}
