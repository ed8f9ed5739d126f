/**
 * Retry Utilities
 *
 * Exponential backoff for transient transport failures of model calls
 * (rate limits, 5xx, dropped connections). Output that fails schema
 * validation is not a transport failure and is never retried here; it goes
 * through the structured-output decoder instead.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { RETRY_CONFIG } from './config';
import { errorMessage } from './errors';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  readonly maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000) */
  readonly initialDelayMs?: number;
  /** Maximum delay in ms between retries (default: 10000) */
  readonly maxDelayMs?: number;
  /** Context for logging (e.g., "Planner structured call") */
  readonly context?: string;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly logger?: Logger;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Known transient error patterns that should trigger a retry.
 */
const RETRYABLE_ERROR_PATTERNS = [
  // Rate limiting
  /rate.?limit/i,
  /too.?many.?requests/i,
  /\b429\b/,
  // Network issues
  /network/i,
  /fetch.*fail/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket.?hang.?up/i,
  // Server errors (5xx)
  /\b5\d{2}\b/,
  /internal.?server.?error/i,
  /service.?unavailable/i,
  /bad.?gateway/i,
  // Provider load shedding
  /overloaded/i,
  /capacity/i,
  /temporarily/i,
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Determines if an error is likely transient and worth retrying.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  // A timeout means the budget was too short, not that the provider hiccuped
  if (error instanceof DOMException && error.name === 'TimeoutError') {
    return false;
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const message = errorMessage(error);
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Calculates delay for exponential backoff with ±25% jitter.
 */
function calculateDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = initialDelayMs * Math.pow(RETRY_CONFIG.BACKOFF_MULTIPLIER, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.round(cappedDelay + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes an async function, retrying transient errors with backoff.
 * Non-transient errors fail immediately.
 *
 * @throws The last error if all retries fail, or immediately for non-retryable errors
 *
 * @example
 * const result = await withRetry(
 *   () => generateText({ model, prompt }),
 *   { context: 'Writer report generation' }
 * );
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = RETRY_CONFIG.MAX_RETRIES,
    initialDelayMs = RETRY_CONFIG.INITIAL_DELAY_MS,
    maxDelayMs = RETRY_CONFIG.MAX_DELAY_MS,
    context = 'operation',
    shouldRetry = isRetryableError,
  } = options;

  const log = options.logger ?? createPrefixedLogger('[Retry]');
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        log.warn(`${context} failed after ${maxRetries + 1} attempts: ${errorMessage(error)}`);
        throw error;
      }

      const delay = calculateDelay(attempt, initialDelayMs, maxDelayMs);
      log.info(
        `${context} failed (attempt ${attempt + 1}/${maxRetries + 1}), ` +
          `retrying in ${delay}ms: ${errorMessage(error)}`
      );
      attempt++;
      await sleep(delay);
    }
  }
}
