/**
 * Retry Utilities
 *
 * Exponential backoff for transient completion failures (rate limits,
 * timeouts, 5xx, dropped connections).
 */

import {
  DEFAULT_RETRY_CONFIG,
  LLMErrorCode,
  LLMProvider,
  type LLMErrorInfo,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
} from './types.js';
import { isLLMError, LLMError } from './errors.js';

/**
 * Delay before retry number `attemptNumber` (1-based).
 *
 * A server retry-after hint wins, capped at `maxDelayMs`. Otherwise
 * `initialDelayMs * multiplier^(attempt - 1)`, capped, plus optional jitter.
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: Required<RetryConfig>,
  errorRetryAfterMs?: number
): number {
  if (errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);
  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay = Math.max(0, delay + (Math.random() - 0.5) * jitterRange);
  }

  return Math.round(delay);
}

export function shouldRetry(error: unknown, config: Required<RetryConfig>): boolean {
  if (!isLLMError(error) || !error.retryable) {
    return false;
  }

  if (config.retryableErrorCodes.length === 0) {
    return true;
  }

  return config.retryableErrorCodes.some((code) => code === error.code);
}

export function createRetryEvent(
  type: RetryEvent['type'],
  attemptNumber: number,
  maxRetries: number,
  error?: LLMErrorInfo,
  nextDelayMs?: number
): RetryEvent {
  return {
    type,
    attemptNumber,
    maxRetries,
    error,
    nextDelayMs,
    timestamp: new Date(),
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function mergeRetryConfig(config?: Partial<RetryConfig>): Required<RetryConfig> {
  return {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
    retryableErrorCodes:
      config?.retryableErrorCodes ?? DEFAULT_RETRY_CONFIG.retryableErrorCodes,
  };
}

export interface WithRetryOptions {
  config?: Partial<RetryConfig> | undefined;
  /** Observer for retry events, typically a logger */
  onRetryEvent?: RetryEventHandler | undefined;
  abortSignal?: AbortSignal | undefined;
}

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or
 * `maxRetries` retries have been spent. `fn` receives the 1-based attempt
 * number.
 *
 * @throws {LLMError} The last error once retries stop
 *
 * @example
 * ```typescript
 * const text = await withRetry(
 *   () => strategy.attemptOrThrow(request),
 *   { config: { maxRetries: 2, initialDelayMs: 2000, maxDelayMs: 10000 } }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attemptNumber: number) => Promise<T>,
  options: WithRetryOptions = {}
): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { onRetryEvent, abortSignal } = options;

  let lastError: LLMError | undefined;

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    if (abortSignal?.aborted) {
      throw new LLMError({
        code: LLMErrorCode.UNKNOWN,
        message: 'Operation aborted',
        provider: LLMProvider.OPENAI,
        retryable: false,
      });
    }

    onRetryEvent?.(createRetryEvent('attempt_start', attempt, config.maxRetries));

    try {
      const result = await fn(attempt);
      onRetryEvent?.(createRetryEvent('attempt_succeeded', attempt, config.maxRetries));
      return result;
    } catch (error) {
      lastError = LLMError.fromError(error);

      onRetryEvent?.(
        createRetryEvent('attempt_failed', attempt, config.maxRetries, lastError.info)
      );

      const isLastAttempt = attempt > config.maxRetries;
      if (isLastAttempt || !shouldRetry(lastError, config)) {
        if (isLastAttempt) {
          onRetryEvent?.(
            createRetryEvent('max_retries_exceeded', attempt, config.maxRetries, lastError.info)
          );
        }
        throw lastError;
      }

      const delayMs = calculateRetryDelay(attempt, config, lastError.retryAfterMs);
      onRetryEvent?.(
        createRetryEvent('retrying', attempt, config.maxRetries, lastError.info, delayMs)
      );

      await sleep(delayMs);
    }
  }

  throw (
    lastError ??
    new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: 'Unexpected retry loop exit',
      provider: LLMProvider.OPENAI,
      retryable: false,
    })
  );
}
