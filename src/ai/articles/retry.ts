/**
 * Retry Utilities
 *
 * Retry logic with exponential backoff for oracle calls. Every failure is
 * classified first: transient and malformed failures are retried, fatal ones
 * are not, and a retryable failure that outlives its attempts escalates to
 * FatalOracleError.
 */

import { classifyOracleError } from '../oracle/classify';
import { FatalOracleError, type OracleError } from '../oracle/types';
import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { RETRY_CONFIG, type RetryPolicy } from './config';

// ============================================================================
// Types
// ============================================================================

export interface RetryAttemptInfo {
  /** Attempt that failed (1-based) */
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: OracleError;
}

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  readonly maxAttempts?: number;
  /** Delay before the first retry (default: 1000) */
  readonly baseDelayMs?: number;
  /** Maximum delay between retries (default: 10000) */
  readonly maxDelayMs?: number;
  /** Random spread applied to each delay, 0.25 = ±25% (default: 0) */
  readonly jitterRatio?: number;
  /** Context for logging (e.g., "Research findings") */
  readonly context?: string;
  readonly logger?: Logger;
  /** Injectable wait, for tests */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  /** Called before each wait */
  readonly onRetry?: (info: RetryAttemptInfo) => void;
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Delay before retry number `attempt` (0-based):
 * min(base * 2^attempt, max), spread by ±jitterRatio.
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterRatio = 0,
  random: () => number = Math.random
): number {
  const exponentialDelay = baseDelayMs * Math.pow(RETRY_CONFIG.BACKOFF_MULTIPLIER, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  if (jitterRatio === 0) return cappedDelay;

  const jitter = cappedDelay * jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleeps for the specified duration.
 *
 * @example
 * await sleep(1000); // Wait 1 second
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Maps a configured policy onto retry options.
 */
export function retryOptionsFromPolicy(policy: RetryPolicy, context?: string): RetryOptions {
  return {
    maxAttempts: policy.maxAttempts,
    baseDelayMs: policy.baseDelayMs,
    maxDelayMs: policy.maxDelayMs,
    jitterRatio: policy.jitterRatio,
    context,
  };
}

/**
 * Executes an async function with retry logic and exponential backoff.
 *
 * @param fn - Receives the 1-based attempt number
 * @throws FatalOracleError for non-retryable failures (immediately) and for
 *   retryable failures once every attempt is spent
 *
 * @example
 * const findings = await withRetry(
 *   () => oracle.generate({ task: 'research', system, prompt, schema }),
 *   { context: 'Research findings', maxAttempts: 3 }
 * );
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = RETRY_CONFIG.MAX_ATTEMPTS,
    baseDelayMs = RETRY_CONFIG.BASE_DELAY_MS,
    maxDelayMs = RETRY_CONFIG.MAX_DELAY_MS,
    jitterRatio = RETRY_CONFIG.JITTER_RATIO,
    context = 'operation',
    logger = createPrefixedLogger('[Retry]'),
    sleep: wait = sleep,
    random = Math.random,
    onRetry,
  } = options;

  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const classified = classifyOracleError(error);

      // Don't retry non-transient errors
      if (!classified.retryable) {
        throw classified;
      }

      if (attempt >= attempts) {
        logger.warn(`${context} failed after ${attempts} attempts: ${classified.message}`);
        throw new FatalOracleError(
          `${context} failed after ${attempts} attempts: ${classified.message}`,
          'retries-exhausted',
          attempts,
          classified
        );
      }

      const delayMs = calculateDelay(attempt - 1, baseDelayMs, maxDelayMs, jitterRatio, random);
      logger.info(
        `${context} failed (attempt ${attempt}/${attempts}, ${classified.kind}), retrying in ${delayMs}ms: ${classified.message}`
      );
      onRetry?.({ attempt, delayMs, error: classified });
      await wait(delayMs);
    }
  }
}
