import dotenv from 'dotenv';
import type { Config, LlmProvider } from './types.js';
import type { RetryConfig } from './utils/retry.js';

dotenv.config();

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, defaultValue?: string): string {
  const value = env[name] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvNumber(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable: ${name}`);
  }
  return parsed;
}

function getProvider(env: Env): LlmProvider {
  const value = (env.LLM_PROVIDER || 'gemini').toLowerCase();
  if (value === 'gemini' || value === 'anthropic') return value;
  throw new Error(`Invalid LLM_PROVIDER: ${value} (expected "gemini" or "anthropic")`);
}

/**
 * Reads configuration from the environment. API keys are checked when the
 * completion service is created, so tests can load config without them.
 */
export function loadConfig(env: Env = process.env): Config {
  const retryConfig: RetryConfig = {
    maxRetries: getEnvNumber(env, 'MAX_RETRIES', 3),
    initialDelayMs: getEnvNumber(env, 'RETRY_INITIAL_DELAY_MS', 1000),
    maxDelayMs: getEnvNumber(env, 'RETRY_MAX_DELAY_MS', 10000),
    backoffMultiplier: 2,
  };

  return {
    llmProvider: getProvider(env),
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    anthropicModel: env.ANTHROPIC_MODEL || 'claude-sonnet-4-20250514',
    llmMaxTokens: getEnvNumber(env, 'LLM_MAX_TOKENS', 1024),
    llmTimeoutMs: getEnvNumber(env, 'LLM_TIMEOUT_MS', 30000),
    databaseUrl: getEnvVar(env, 'DATABASE_URL'),
    controlDbUrl: env.CONTROL_DB_URL || undefined,
    catalogPath: env.CATALOG_PATH || undefined,
    maxRows: getEnvNumber(env, 'MAX_ROWS', 200),
    statementTimeoutMs: getEnvNumber(env, 'STATEMENT_TIMEOUT_MS', 10000),
    maxResultRowsForLLM: getEnvNumber(env, 'MAX_RESULT_ROWS_FOR_LLM', 10),
    memoryMaxEntries: getEnvNumber(env, 'MEMORY_MAX_ENTRIES', 10),
    memoryTtlMs: getEnvNumber(env, 'MEMORY_TTL_MS', 30 * 60 * 1000),
    turnLogPath: env.TURN_LOG_PATH || 'logs/turns.jsonl',
    securityLogPath: env.SECURITY_LOG_PATH || 'logs/security_log.jsonl',
    sqlDialect: env.SQL_DIALECT || 'PostgresQL',
    retry: retryConfig,
  };
}
