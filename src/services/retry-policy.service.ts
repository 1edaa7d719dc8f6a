/**
 * Retry Policy Service
 *
 * Implements retry logic around a single outbound call:
 * - Exponential backoff with cap
 * - Optional jitter to prevent thundering herd
 * - Error classification (retryable vs permanent)
 *
 * Formula: delay = min(base_delay * multiplier^(attempt-1), max_delay) ± jitter%
 * Example (base=1s, multiplier=2): 1s, 2s, 4s, 8s, ... capped at max_delay
 */

import type { ErrorCategory } from '../types/hospital-api.types.js';

export interface RetryPolicyConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterPercent: number;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  reason: string;
  category: ErrorCategory;
  delayMs?: number;
}

export interface ErrorClassification {
  isRetryable: boolean;
  category: ErrorCategory;
  reason: string;
}

/**
 * Failure details as reported by a provider or a thrown error
 */
export type FailureDetails = { code?: string; message?: string } | Error | string;

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];
const NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'ERR_NETWORK'];

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function describeFailure(error?: FailureDetails): { code: string; message: string } {
  if (error === undefined) {
    return { code: '', message: '' };
  }
  if (typeof error === 'string') {
    return { code: '', message: error };
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  return { code, message: error.message ?? '' };
}

/**
 * Retry Policy Service
 * Determines retry strategy based on error type and attempt count
 */
export class RetryPolicyService {
  private config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      baseDelayMs: config.baseDelayMs ?? 1000, // 1 second
      multiplier: config.multiplier ?? 2,
      maxDelayMs: config.maxDelayMs ?? 300000, // 5 minutes
      jitterPercent: config.jitterPercent ?? 0,
      sleep: config.sleep ?? defaultSleep,
      random: config.random ?? Math.random,
    };
  }

  /**
   * Classifies an error to determine if it's retryable
   *
   * Non-retryable (4xx client errors):
   * - 400 Bad Request - Invalid request format
   * - 401 Unauthorized
   * - 403 Forbidden
   * - 404 Not Found
   * - 409 Conflict
   * - 422 Unprocessable Entity - Validation failed
   *
   * Retryable errors:
   * - 408 Request Timeout
   * - 429 Too Many Requests
   * - 5xx Server errors
   * - Network errors and timeouts (no status code)
   */
  classifyError(statusCode?: number, error?: FailureDetails): ErrorClassification {
    // Network/timeout errors (no status code)
    if (!statusCode) {
      const { code, message } = describeFailure(error);
      const lowered = message.toLowerCase();

      if (TIMEOUT_CODES.includes(code) || lowered.includes('timeout')) {
        return {
          isRetryable: true,
          category: 'timeout',
          reason: 'Request timeout',
        };
      }

      if (NETWORK_CODES.includes(code) || lowered.includes('network')) {
        return {
          isRetryable: true,
          category: 'network',
          reason: 'Network error - connection failed',
        };
      }

      return {
        isRetryable: true,
        category: 'unknown',
        reason: 'Unknown error - will retry',
      };
    }

    // 4xx Client Errors (mostly non-retryable)
    if (statusCode >= 400 && statusCode < 500) {
      if (statusCode === 408) {
        return {
          isRetryable: true,
          category: 'timeout',
          reason: '408 Request Timeout',
        };
      }

      if (statusCode === 429) {
        return {
          isRetryable: true,
          category: 'rate_limit',
          reason: '429 Too Many Requests - rate limit exceeded',
        };
      }

      const reasons: Record<number, string> = {
        400: '400 Bad Request - invalid request format',
        401: '401 Unauthorized - invalid credentials',
        403: '403 Forbidden - access denied',
        404: '404 Not Found - resource does not exist',
        409: '409 Conflict - resource already exists',
        422: '422 Unprocessable Entity - validation failed',
      };

      return {
        isRetryable: false,
        category: 'client_error',
        reason: reasons[statusCode] ?? `${statusCode} Client Error - permanent failure`,
      };
    }

    // 5xx Server Errors (retryable)
    if (statusCode >= 500 && statusCode < 600) {
      const reasons: Record<number, string> = {
        500: '500 Internal Server Error',
        502: '502 Bad Gateway',
        503: '503 Service Unavailable',
        504: '504 Gateway Timeout',
      };

      return {
        isRetryable: true,
        category: 'server_error',
        reason: reasons[statusCode] ?? `${statusCode} Server Error - temporary failure`,
      };
    }

    // 2xx that the caller did not accept
    if (statusCode >= 200 && statusCode < 300) {
      return {
        isRetryable: false,
        category: 'unknown',
        reason: `${statusCode} Unexpected success status`,
      };
    }

    return {
      isRetryable: true,
      category: 'unknown',
      reason: `${statusCode} Unknown status - will retry`,
    };
  }

  /**
   * Decides whether to retry based on attempt count and error classification
   *
   * @param currentAttempt - Attempt that just failed (1-indexed)
   * @param statusCode - HTTP status code (if a response was received)
   * @param error - Error code/message (if available)
   */
  shouldRetry(currentAttempt: number, statusCode?: number, error?: FailureDetails): RetryDecision {
    const classification = this.classifyError(statusCode, error);

    if (!classification.isRetryable) {
      return {
        shouldRetry: false,
        reason: `Permanent error - ${classification.reason}`,
        category: classification.category,
      };
    }

    if (currentAttempt >= this.config.maxAttempts) {
      return {
        shouldRetry: false,
        reason: `Max attempts exceeded (${currentAttempt}/${this.config.maxAttempts}) - ${classification.reason}`,
        category: classification.category,
      };
    }

    return {
      shouldRetry: true,
      reason: `Retryable error (attempt ${currentAttempt}/${this.config.maxAttempts}) - ${classification.reason}`,
      category: classification.category,
      delayMs: this.calculateDelay(currentAttempt),
    };
  }

  /**
   * Calculates retry delay with exponential backoff and jitter
   *
   * Examples (base=1000ms, multiplier=2, jitter=20%):
   * - Attempt 1: 1s ± 20% = 800ms-1200ms
   * - Attempt 2: 2s ± 20% = 1600ms-2400ms
   * - Attempt 3: 4s ± 20% = 3200ms-4800ms
   *
   * @param attempt - Attempt that just failed (1-indexed)
   * @returns Delay in milliseconds
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay = this.config.baseDelayMs * Math.pow(this.config.multiplier, attempt - 1);

    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Random value between -jitterRange and +jitterRange
    const jitterRange = cappedDelay * (this.config.jitterPercent / 100);
    const jitter = (this.config.random() * 2 - 1) * jitterRange;

    return Math.max(0, Math.round(cappedDelay + jitter));
  }

  /**
   * Waits for a backoff delay
   */
  async wait(delayMs: number): Promise<void> {
    await this.config.sleep(delayMs);
  }

  /**
   * Formats delay for human-readable logging
   * @returns Formatted string (e.g., "1.5s", "2m 30s")
   */
  formatDelay(delayMs: number): string {
    if (delayMs < 1000) {
      return `${delayMs}ms`;
    }

    if (delayMs < 60000) {
      return `${(delayMs / 1000).toFixed(1)}s`;
    }

    const minutes = Math.floor(delayMs / 60000);
    const seconds = Math.floor((delayMs % 60000) / 1000);
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }

  getMaxAttempts(): number {
    return this.config.maxAttempts;
  }
}
