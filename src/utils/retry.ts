import { logger } from './logger';
import { RateLimitError, handleError } from './errors';
import type { CollectionError } from './errors';

export interface RetryEvent {
  operation: string;
  attempt: number;
  delayMs: number;
  error: CollectionError;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterFactor: number;  // 0-1, adds randomness to delay
  retryableErrors?: string[];  // Extra error names to retry beyond the transient kinds
  onRetry?: (event: RetryEvent) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.2,
};

export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalDelayMs: number }
  | { success: false; error: CollectionError; attempts: number; totalDelayMs: number };

export function calculateDelay(attempt: number, config: RetryConfig, error?: Error): number {
  // A server-provided Retry-After wins over the backoff curve
  if (error instanceof RateLimitError && error.retryAfter) {
    return Math.min(error.retryAfter, config.maxDelayMs);
  }

  const base = Math.min(config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1), config.maxDelayMs);
  if (config.jitterFactor <= 0) {
    return Math.floor(base);
  }
  const jitter = base * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.floor(Math.max(0, base + jitter));
}

/** Transient failures retry; permanent and systemic ones never do. */
export function isRetryable(error: unknown, config: Pick<RetryConfig, 'retryableErrors'> = {}): boolean {
  if (handleError(error).isRetryable) {
    return true;
  }
  return error instanceof Error && (config.retryableErrors?.includes(error.name) ?? false);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string,
  customConfig?: Partial<RetryConfig>
): Promise<RetryResult<T>> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...customConfig };
  let totalDelayMs = 0;
  let attempt = 1;

  for (;;) {
    try {
      const data = await operation(attempt);
      return { success: true, data, attempts: attempt, totalDelayMs };
    } catch (thrown) {
      const error = handleError(thrown);
      const retryable = isRetryable(thrown, config);

      if (attempt >= config.maxAttempts || !retryable) {
        logger.warn('Retry', `${operationName} failed after ${attempt} attempt(s)`, {
          error: error.message,
          reason: error.reason,
          retryable,
        });
        return { success: false, error, attempts: attempt, totalDelayMs };
      }

      const delayMs = calculateDelay(attempt, config, error);
      totalDelayMs += delayMs;
      config.onRetry?.({ operation: operationName, attempt, delayMs, error });
      logger.debug('Retry', `${operationName} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
        reason: error.reason,
        nextAttempt: attempt + 1,
        maxAttempts: config.maxAttempts,
      });

      await new Promise((resolve) => setTimeout(resolve, delayMs));
      attempt++;
    }
  }
}

// Throwing variant for callers that only care about the value
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string = 'operation',
  customConfig?: Partial<RetryConfig>
): Promise<T> {
  const result = await withRetry(operation, operationName, customConfig);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
