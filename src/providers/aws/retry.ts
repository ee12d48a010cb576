/**
 * AWS Retry Runner
 *
 * Bounded exponential backoff for throttled AWS API calls. Only errors the
 * classifier reports as throttling are retried; everything else surfaces
 * immediately.
 */

import { isThrottlingError } from './errors';

export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
};

export const AWS_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 4,
  minDelayMs: 250,
  maxDelayMs: 5_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const defaults = AWS_RETRY_DEFAULTS;
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Delay before the given (1-based) retry, before jitter
 */
export function backoffDelay(attempt: number, config: Required<RetryConfig>): number {
  return Math.min(config.minDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
}

/**
 * Extract retry-after delay from an AWS SDK v3 error response
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  if (!err || typeof err !== 'object') return undefined;

  const response: unknown = Reflect.get(err, '$response');
  if (!response || typeof response !== 'object') return undefined;
  const headers: unknown = Reflect.get(response, 'headers');
  if (!headers || typeof headers !== 'object') return undefined;

  const retryAfter: unknown = Reflect.get(headers, 'retry-after');
  if (typeof retryAfter === 'string') {
    const seconds = parseInt(retryAfter, 10);
    if (!Number.isNaN(seconds)) return seconds * 1000;
  }
  return undefined;
}

/**
 * Run `fn`, retrying with exponential backoff while `shouldRetry` allows
 */
export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = resolveRetryConfig(options);
  const shouldRetry = options.shouldRetry ?? isThrottlingError;
  let lastErr: unknown;

  for (let attempt = 1; attempt <= config.attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= config.attempts || !shouldRetry(err, attempt)) break;

      const retryAfterMs = options.retryAfterMs?.(err);
      const hasRetryAfter = typeof retryAfterMs === 'number' && Number.isFinite(retryAfterMs);
      let delay = hasRetryAfter
        ? Math.min(Math.max(retryAfterMs, config.minDelayMs), config.maxDelayMs)
        : backoffDelay(attempt, config);
      delay = applyJitter(delay, config.jitter);
      delay = Math.min(Math.max(delay, config.minDelayMs), config.maxDelayMs);

      options.onRetry?.({
        attempt,
        maxAttempts: config.attempts,
        delayMs: delay,
        err,
        label: options.label,
      });
      await sleep(delay);
    }
  }

  throw lastErr ?? new Error('Retry failed');
}

/**
 * Create a retry runner bound to one configuration
 */
export function createAWSRetryRunner(config: RetryConfig = {}, onRetry?: (info: RetryInfo) => void) {
  const resolved = resolveRetryConfig(config);

  return function awsRetry<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    return retryAsync(fn, {
      ...resolved,
      label,
      shouldRetry: isThrottlingError,
      retryAfterMs: getAWSRetryAfterMs,
      onRetry,
    });
  };
}

export type AWSRetryRunner = ReturnType<typeof createAWSRetryRunner>;
