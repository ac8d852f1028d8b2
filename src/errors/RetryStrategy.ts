/**
 * Retry Strategy System
 *
 * Provides configurable retry policies for handling transient failures.
 * Works in conjunction with the ApplicationError hierarchy to make
 * retry decisions based on error type and context.
 *
 * Rate-limited attempts wait for the server's hint and do not advance
 * the exponential backoff; every other retryable failure does.
 */

import { ApplicationError, ErrorCode, RateLimitError } from './ApplicationError.js';
import { logger } from '../utils/logging.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts, the first one included
   */
  maxAttempts: number;

  /**
   * Delay in milliseconds before the first backoff retry
   */
  initialDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries
   */
  maxDelayMs: number;

  /**
   * Backoff multiplier (e.g., 2 for exponential backoff)
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1) to randomize backoff delays
   */
  jitterFactor: number;

  /**
   * Wait applied to a rate-limited attempt that carried no retry-after hint.
   * Falls back to initialDelayMs.
   */
  rateLimitDelayMs?: number;

  /**
   * Error codes that should be retried
   */
  retryableErrorCodes?: ErrorCode[];

  /**
   * Custom function to determine if error is retryable
   * If provided, this overrides the error's built-in retryable flag
   */
  shouldRetry?: (error: Error, attemptNumber: number) => boolean;

  /**
   * Callback invoked before each retry attempt
   */
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

export type Sleeper = (ms: number) => Promise<void>;

export const defaultSleeper: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Default retry policy for general operational errors
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Catalog requests: deterministic delays, every transient provider failure retried
 */
export const NETWORK_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0,
  retryableErrorCodes: [
    ErrorCode.NETWORK_CONNECTION_FAILED,
    ErrorCode.NETWORK_TIMEOUT,
    ErrorCode.PROVIDER_RATE_LIMIT,
    ErrorCode.PROVIDER_SERVER_ERROR,
    ErrorCode.PROVIDER_INVALID_RESPONSE,
  ],
};

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly sleep: Sleeper = defaultSleeper
  ) {}

  /**
   * Execute an operation and return a detailed result. Never throws.
   */
  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<RetryResult<T>> {
    let attemptCount = 0;
    let backoffStep = 0;
    let totalDelayMs = 0;
    let lastError: Error = new Error(`${operationName} was never attempted`);

    while (attemptCount < this.policy.maxAttempts) {
      attemptCount++;

      try {
        const value = await operation();
        return { success: true, value, attemptCount, totalDelayMs };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const shouldRetry = this.shouldRetryError(lastError, attemptCount);

        if (!shouldRetry || attemptCount >= this.policy.maxAttempts) {
          logger.warn(`${operationName} failed after ${attemptCount} attempt(s)`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });

          return { success: false, error: lastError, attemptCount, totalDelayMs };
        }

        let delayMs: number;
        const rateLimitDelay = this.rateLimitDelay(lastError);
        if (rateLimitDelay !== undefined) {
          delayMs = rateLimitDelay;
        } else {
          backoffStep++;
          delayMs = this.calculateDelay(backoffStep);
        }
        totalDelayMs += delayMs;

        if (this.policy.onRetry) {
          this.policy.onRetry(lastError, attemptCount, delayMs);
        }

        logger.info(`Retrying ${operationName} after error`, {
          error: lastError.message,
          attemptNumber: attemptCount,
          nextAttemptIn: delayMs,
          totalAttempts: this.policy.maxAttempts,
        });

        await this.sleep(delayMs);
      }
    }

    return { success: false, error: lastError, attemptCount, totalDelayMs };
  }

  /**
   * Determine if an error should be retried
   */
  private shouldRetryError(error: Error, attemptNumber: number): boolean {
    // Custom retry logic takes precedence
    if (this.policy.shouldRetry) {
      return this.policy.shouldRetry(error, attemptNumber);
    }

    if (error instanceof ApplicationError) {
      if (!error.retryable) {
        return false;
      }

      if (this.policy.retryableErrorCodes) {
        return this.policy.retryableErrorCodes.includes(error.code);
      }

      return true;
    }

    // For non-ApplicationErrors, default to not retrying
    return false;
  }

  /**
   * Wait for a rate-limited attempt, or undefined for any other error
   */
  private rateLimitDelay(error: Error): number | undefined {
    if (!(error instanceof RateLimitError)) {
      return undefined;
    }
    return extractRetryAfter(error) ?? this.policy.rateLimitDelayMs ?? this.policy.initialDelayMs;
  }

  /**
   * Exponential backoff: initialDelay * (multiplier ^ (step - 1)), capped, with jitter
   */
  private calculateDelay(backoffStep: number): number {
    const exponentialDelay =
      this.policy.initialDelayMs *
      Math.pow(this.policy.backoffMultiplier, backoffStep - 1);

    const cappedDelay = Math.min(exponentialDelay, this.policy.maxDelayMs);

    const jitter = cappedDelay * this.policy.jitterFactor * (Math.random() - 0.5);

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }
}

// ============================================
// HELPER FUNCTIONS
// ============================================

/**
 * Extract retry-after delay (ms) from a RateLimitError
 */
export function extractRetryAfter(error: Error): number | undefined {
  if (error instanceof RateLimitError && typeof error.retryAfter === 'number') {
    return error.retryAfter * 1000;
  }
  return undefined;
}
