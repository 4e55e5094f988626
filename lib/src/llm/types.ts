/**
 * LLM Completion Types
 *
 * Messages, error taxonomy, retry configuration and the strategy contract
 * shared by the completion client and its strategy ladder.
 */

import { z } from 'zod';

import type { LLMError } from './errors.js';

// ============================================================================
// Provider & Messages
// ============================================================================

export const LLMProvider = {
  OPENAI: 'openai',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

export const LLMMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1),
});

export type LLMMessage = z.infer<typeof LLMMessageSchema>;

export const LLMMessagesSchema = z.array(LLMMessageSchema).min(1);

export function createSystemMessage(content: string): LLMMessage {
  return { role: 'system', content };
}

export function createUserMessage(content: string): LLMMessage {
  return { role: 'user', content };
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * LLM-specific error codes
 */
export const LLMErrorCode = {
  RATE_LIMIT: 'rate_limit',
  AUTH_ERROR: 'auth_error',
  MODEL_NOT_FOUND: 'model_not_found',
  /** The endpoint or a request parameter is not supported by this API/model */
  INCOMPATIBLE: 'incompatible',
  TIMEOUT: 'timeout',
  SERVER_ERROR: 'server_error',
  NETWORK_ERROR: 'network_error',
  /** Every completion strategy was exhausted without usable text */
  GENERATION_FAILED: 'generation_failed',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export const LLMErrorInfoSchema = z.object({
  code: z.enum([
    'rate_limit',
    'auth_error',
    'model_not_found',
    'incompatible',
    'timeout',
    'server_error',
    'network_error',
    'generation_failed',
    'unknown',
  ]),
  message: z.string(),
  provider: z.enum(['openai']),
  retryable: z.boolean(),
  retryAfterMs: z.number().int().nonnegative().optional(),
  originalError: z.unknown().optional(),
});

export type LLMErrorInfo = z.infer<typeof LLMErrorInfoSchema>;

// ============================================================================
// Retry Configuration Types
// ============================================================================

export const RetryConfigSchema = z.object({
  /** Retries after the first attempt */
  maxRetries: z.number().int().nonnegative().default(2),
  initialDelayMs: z.number().int().positive().default(2000),
  maxDelayMs: z.number().int().positive().default(10000),
  backoffMultiplier: z.number().positive().default(2),
  jitter: z.boolean().default(false),
  /** Maximum jitter as a fraction of the delay */
  jitterFactor: z.number().min(0).max(1).default(0.25),
  retryableErrorCodes: z
    .array(z.enum(['rate_limit', 'timeout', 'server_error', 'network_error']))
    .optional(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Three attempts per strategy, 2s doubling to a 10s cap.
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 2000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitter: false,
  jitterFactor: 0.25,
  retryableErrorCodes: ['rate_limit', 'timeout', 'server_error', 'network_error'],
};

export interface RetryEvent {
  type: 'attempt_start' | 'attempt_failed' | 'attempt_succeeded' | 'retrying' | 'max_retries_exceeded';
  /** 1-based */
  attemptNumber: number;
  maxRetries: number;
  error?: LLMErrorInfo | undefined;
  /** Only set on 'retrying' events */
  nextDelayMs?: number | undefined;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;

// ============================================================================
// Completion Strategies
// ============================================================================

/**
 * Completion API shapes, tried in this order.
 */
export const CompletionStrategyName = {
  /** Responses API with a JSON object output format */
  RESPONSES_JSON: 'responses_json',
  /** Chat Completions with `response_format: json_object` */
  CHAT_JSON: 'chat_json',
  /** Chat Completions relying on the prompt alone */
  CHAT_PLAIN: 'chat_plain',
} as const;

export type CompletionStrategyName =
  (typeof CompletionStrategyName)[keyof typeof CompletionStrategyName];

export const COMPLETION_STRATEGY_ORDER: readonly CompletionStrategyName[] = [
  CompletionStrategyName.RESPONSES_JSON,
  CompletionStrategyName.CHAT_JSON,
  CompletionStrategyName.CHAT_PLAIN,
];

export interface CompletionRequest {
  model: string;
  messages: LLMMessage[];
}

/**
 * Text returned by whichever strategy succeeded.
 */
export interface CompletionText {
  text: string;
  strategy: CompletionStrategyName;
  /** Model reported by the API, falling back to the requested model */
  model: string;
  /** Attempts made on the successful strategy */
  attempts: number;
}

/**
 * Tagged outcome of one strategy attempt.
 *
 * - success: usable text
 * - incompatible: this API shape cannot serve the request; move on
 * - transient: worth retrying on the same strategy
 * - fatal: no strategy can succeed (bad credentials, unknown model)
 */
export type StrategyOutcome =
  | { kind: 'success'; text: string; model: string }
  | { kind: 'incompatible'; reason: string }
  | { kind: 'transient'; error: LLMError }
  | { kind: 'fatal'; error: LLMError };

export interface StrategyAttemptOptions {
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

export interface CompletionStrategy {
  readonly name: CompletionStrategyName;
  attempt(request: CompletionRequest, options: StrategyAttemptOptions): Promise<StrategyOutcome>;
}

/**
 * Record of how one strategy ended, kept for diagnostics.
 */
export interface StrategyReport {
  strategy: CompletionStrategyName;
  outcome: 'success' | 'incompatible' | 'exhausted' | 'fatal';
  attempts: number;
  detail?: string | undefined;
}
