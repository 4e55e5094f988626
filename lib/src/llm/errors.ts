/**
 * LLM Error Types
 *
 * Error classes for completion failures. The completion client uses the
 * class (and `retryable`) to decide whether to retry a strategy, move to the
 * next one, or stop the ladder.
 */

import {
  type LLMProvider,
  type LLMErrorInfo,
  type StrategyReport,
  LLMErrorCode,
  LLMProvider as Providers,
} from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

/**
 * Base error class for all LLM-related errors.
 */
export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  get code(): LLMErrorInfo['code'] {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  /**
   * Wraps an unknown error as a non-retryable LLMError.
   */
  static fromError(error: unknown, provider: LLMProvider = Providers.OPENAI): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: error instanceof Error ? error.message : String(error),
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * API rate limit exceeded. Retryable; carries the server's retry-after hint.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.RATE_LIMIT,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 60000,
      originalError,
    });
    this.name = 'RateLimitError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RateLimitError);
    }
  }
}

/**
 * Invalid or missing API key. Stops the strategy ladder.
 */
export class AuthenticationError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.AUTH_ERROR,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AuthenticationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthenticationError);
    }
  }
}

/**
 * The requested model does not exist or is not available to this key.
 * Stops the strategy ladder.
 */
export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.MODEL_NOT_FOUND,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ModelNotFoundError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelNotFoundError);
    }
  }
}

/**
 * The endpoint or a parameter (such as a JSON output format) is not
 * supported. The client moves on to the next strategy without retrying.
 */
export class IncompatibleRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INCOMPATIBLE,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'IncompatibleRequestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IncompatibleRequestError);
    }
  }
}

export class TimeoutError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.TIMEOUT,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'TimeoutError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TimeoutError);
    }
  }
}

export class ServerError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.SERVER_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'ServerError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ServerError);
    }
  }
}

export class NetworkError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.NETWORK_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'NetworkError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetworkError);
    }
  }
}

/**
 * Raised when the completion ladder ends without usable text.
 *
 * `reports` lists how each strategy ended, in the order they were tried.
 */
export class GenerationFailedError extends LLMError {
  readonly reports: readonly StrategyReport[];

  constructor(
    message: string,
    reports: readonly StrategyReport[],
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.GENERATION_FAILED,
      message,
      provider: Providers.OPENAI,
      retryable: false,
      originalError,
    });
    this.name = 'GenerationFailedError';
    this.reports = reports;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationFailedError);
    }
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function isIncompatibleRequestError(error: unknown): error is IncompatibleRequestError {
  return error instanceof IncompatibleRequestError;
}

export function isGenerationFailedError(error: unknown): error is GenerationFailedError {
  return error instanceof GenerationFailedError;
}

/**
 * Errors that no later strategy can fix.
 */
export function isFatalCompletionError(error: unknown): boolean {
  return error instanceof AuthenticationError || error instanceof ModelNotFoundError;
}

export function isRetryableError(error: unknown): boolean {
  return isLLMError(error) && error.retryable;
}
