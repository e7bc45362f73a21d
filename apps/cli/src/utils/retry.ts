import type { AcquisitionOutcome } from '@subtitle-sync/shared-types';
import {
  ConfigurationError,
  ConnectionError,
  DownloadQuotaExceededError,
  NotFoundError,
  RateLimitedError,
  ServiceError,
  errorMessage,
} from './errors';
import { logger } from './logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function isRetryable(error: unknown): boolean {
  if (error instanceof RateLimitedError || error instanceof ConnectionError) {
    return true;
  }
  return error instanceof ServiceError && error.statusCode >= 500;
}

export function isRunLevelError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof DownloadQuotaExceededError;
}

/**
 * Delay before the attempt following `attempt` (1-based). A server-provided
 * Retry-After always wins over the exponential schedule.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, error?: unknown): number {
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
}

interface RetryOptions {
  label: string;
  sleep?: Sleep;
}

export async function withRetry<T>(
  policy: RetryPolicy,
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt, error);
      logger.warn(
        `${options.label}: ${errorMessage(error)}. Retrying (${attempt}/${policy.maxAttempts - 1}) after ${delay}ms`
      );
      await wait(delay);
    }
  }
}

/**
 * Runs an item-level operation under the retry policy and folds the result
 * into a terminal outcome. Errors that are not about the item itself
 * (configuration, exhausted quota) propagate to the caller.
 */
export async function runWithRetry<T>(
  policy: RetryPolicy,
  operation: () => Promise<T>,
  options: RetryOptions & { isRunLevel?: (error: unknown) => boolean }
): Promise<AcquisitionOutcome<T>> {
  try {
    const value = await withRetry(policy, operation, options);
    return { status: 'success', value };
  } catch (error) {
    const isRunLevel = options.isRunLevel ?? isRunLevelError;
    if (isRunLevel(error)) {
      throw error;
    }
    if (error instanceof NotFoundError) {
      return { status: 'not_found', reason: error.message };
    }
    if (isRetryable(error)) {
      return {
        status: 'not_found',
        reason: `gave up after ${policy.maxAttempts} attempt(s): ${errorMessage(error)}`,
      };
    }
    return {
      status: 'fatal',
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
