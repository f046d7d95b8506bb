import { join } from 'path';
import { RetryPolicyOptions } from '../../application/retry/RetryPolicy';

export interface AppConfig {
  port: number;
  databasePath: string;
  githubToken?: string;
  geminiApiKey?: string;
  geminiModel: string;
  aiTimeoutMs: number;
  apiTokens: string[];
  retry: Pick<RetryPolicyOptions, 'maxAttempts' | 'baseDelayMs' | 'factor' | 'jitter' | 'maxDelayMs'> & {
    invalidResponseMaxRetries: number;
  };
  limits: {
    maxArtifactBytes: number;
    maxFileBytes: number;
    maxFiles: number;
  };
  resultCacheTtlMs: number;
}

export const APP_CONFIG = Symbol('AppConfig');

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min || String(value) !== raw.trim()) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readFloat(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${name} must be a number between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Read the application configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', 3000, 1),
    databasePath: readOptional(env, 'DATABASE_PATH') || join(process.cwd(), 'data', 'analyses.db'),
    githubToken: readOptional(env, 'GITHUB_TOKEN'),
    geminiApiKey: readOptional(env, 'GEMINI_API_KEY'),
    geminiModel: readOptional(env, 'GEMINI_MODEL') || 'gemini-1.5-flash',
    aiTimeoutMs: readInt(env, 'AI_TIMEOUT_MS', 60000, 1),
    apiTokens: (env.API_TOKENS || '')
      .split(',')
      .map((token) => token.trim())
      .filter((token) => token.length > 0),
    retry: {
      maxAttempts: readInt(env, 'RETRY_MAX_ATTEMPTS', 5, 1),
      baseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', 1000),
      factor: readFloat(env, 'RETRY_FACTOR', 2, 1, 10),
      jitter: readFloat(env, 'RETRY_JITTER', 0.2, 0, 1),
      maxDelayMs: readInt(env, 'RETRY_MAX_DELAY_MS', 30000),
      invalidResponseMaxRetries: readInt(env, 'INVALID_RESPONSE_MAX_RETRIES', 2),
    },
    limits: {
      maxArtifactBytes: readInt(env, 'MAX_ARTIFACT_BYTES', 200000, 1),
      maxFileBytes: readInt(env, 'MAX_FILE_BYTES', 50000, 1),
      maxFiles: readInt(env, 'MAX_FILES', 100, 1),
    },
    resultCacheTtlMs: readInt(env, 'RESULT_CACHE_TTL_MS', 3600000),
  };
}
