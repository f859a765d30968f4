/**
 * Retry with exponential backoff and wall-clock timeouts for collaborator calls
 */

import { CollaboratorTimeoutError } from '../errors.js';

/**
 * Retry configuration for collaborator calls
 */
export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

/** Used when the environment does not override the retry settings. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,      // Start with 1 second
  maxDelayMs: 10000,         // Cap at 10 seconds
  backoffMultiplier: 2,      // Double each time: 1s, 2s, 4s
};

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 529]);
const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN']);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

/**
 * Checks if an error is retryable (overload, rate limit, network errors).
 * Timeouts are not retried: the caller's budget is already spent.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error || error instanceof CollaboratorTimeoutError) return false;

  const status = readProperty(error, 'status');
  if (typeof status === 'number' && RETRYABLE_STATUS.has(status)) {
    return true;
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && RETRYABLE_CODES.has(code)) {
    return true;
  }

  return false;
}

/** Backoff delay before retry `attempt` (0-indexed), capped at `maxDelayMs`. */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs a completion-provider call, retrying overload and network failures
 * with exponential backoff. Rethrows the last error once attempts run out.
 *
 * @param signal - Stops further attempts once aborted
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  signal?: AbortSignal
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      const result = await fn();
      if (attempt > 0) {
        console.log(`✓ Retry succeeded on attempt ${attempt + 1}`);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error) || signal?.aborted) {
        throw error;
      }

      if (attempt < config.maxRetries) {
        const delay = calculateDelay(attempt, config);
        console.log(`⚠️  Service overloaded. Retrying in ${delay / 1000}s... (attempt ${attempt + 1}/${config.maxRetries})`);
        await sleep(delay);
        if (signal?.aborted) throw error;
      } else {
        console.log(`❌ All ${config.maxRetries} retry attempts failed`);
      }
    }
  }

  throw lastError;
}

/**
 * Races `fn` against a wall-clock budget. On expiry the signal handed to `fn`
 * is aborted and the returned promise rejects with CollaboratorTimeoutError.
 */
export async function withTimeout<T>(
  collaborator: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
