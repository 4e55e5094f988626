/**
 * Completion Client
 *
 * Folds over an ordered list of completion strategies. Each strategy gets its
 * own retry budget for transient failures; an incompatible or exhausted
 * strategy hands over to the next one, and a fatal one ends the ladder.
 */

import OpenAI from 'openai';

import {
  type CompletionRequest,
  type CompletionStrategy,
  type CompletionText,
  type RetryConfig,
  type RetryEvent,
  type StrategyReport,
  LLMMessagesSchema,
  LLMProvider,
} from './types.js';
import {
  GenerationFailedError,
  IncompatibleRequestError,
  isFatalCompletionError,
  isIncompatibleRequestError,
} from './errors.js';
import { mergeRetryConfig, withRetry } from './retry.js';
import { type OpenAIClient, createDefaultStrategies } from './strategies.js';
import { type Logger, createLogger } from '../logging/index.js';

export const DEFAULT_COMPLETION_TIMEOUT_MS = 120_000;

export interface CompletionClientConfig {
  apiKey?: string | undefined;
  baseUrl?: string | undefined;
  /** Per-attempt request timeout */
  timeoutMs?: number | undefined;
  retry?: Partial<RetryConfig> | undefined;
  logger?: Logger | undefined;
  /** Prebuilt SDK client; when absent one is built from apiKey/baseUrl */
  client?: OpenAIClient | undefined;
  /** Overrides the default three-strategy ladder */
  strategies?: CompletionStrategy[] | undefined;
}

export interface CompleteOptions {
  signal?: AbortSignal | undefined;
}

export class CompletionClient {
  private readonly strategies: CompletionStrategy[];
  private readonly retryConfig: Required<RetryConfig>;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: CompletionClientConfig = {}) {
    // SDK retries are off: backoff is owned by withRetry
    const client =
      config.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 0,
      });

    this.strategies = config.strategies ?? createDefaultStrategies(client);
    this.retryConfig = mergeRetryConfig(config.retry);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
    this.logger = config.logger ?? createLogger('llm');
  }

  /**
   * Returns the first usable completion text.
   *
   * @throws {GenerationFailedError} When every strategy failed, or one failed fatally
   */
  async complete(request: CompletionRequest, options: CompleteOptions = {}): Promise<CompletionText> {
    LLMMessagesSchema.parse(request.messages);

    const reports: StrategyReport[] = [];

    for (const strategy of this.strategies) {
      let attempts = 0;

      try {
        const result = await withRetry(
          async (attemptNumber): Promise<{ text: string; model: string }> => {
            attempts = attemptNumber;
            const outcome = await strategy.attempt(request, {
              timeoutMs: this.timeoutMs,
              signal: options.signal,
            });

            switch (outcome.kind) {
              case 'success':
                return { text: outcome.text, model: outcome.model };
              case 'incompatible':
                throw new IncompatibleRequestError(outcome.reason, LLMProvider.OPENAI);
              case 'transient':
              case 'fatal':
                throw outcome.error;
            }
          },
          {
            config: this.retryConfig,
            abortSignal: options.signal,
            onRetryEvent: (event) => this.logRetryEvent(strategy.name, event),
          }
        );

        reports.push({ strategy: strategy.name, outcome: 'success', attempts });
        this.logger.info('Completion succeeded', {
          strategy: strategy.name,
          model: result.model,
          attempts,
        });

        return { text: result.text, strategy: strategy.name, model: result.model, attempts };
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);

        if (isFatalCompletionError(error)) {
          reports.push({ strategy: strategy.name, outcome: 'fatal', attempts, detail });
          this.logger.error('Completion failed fatally', error, { strategy: strategy.name });
          throw new GenerationFailedError(`Completion failed: ${detail}`, reports, error);
        }

        if (isIncompatibleRequestError(error)) {
          reports.push({ strategy: strategy.name, outcome: 'incompatible', attempts, detail });
          this.logger.warn('Strategy not usable, trying next', { strategy: strategy.name, detail });
        } else {
          reports.push({ strategy: strategy.name, outcome: 'exhausted', attempts, detail });
          this.logger.warn('Strategy exhausted, trying next', {
            strategy: strategy.name,
            attempts,
            detail,
          });
        }

        if (options.signal?.aborted) {
          throw new GenerationFailedError('Completion aborted', reports, error);
        }
      }
    }

    throw new GenerationFailedError(
      `All completion strategies failed (${reports.map((r) => `${r.strategy}: ${r.outcome}`).join(', ')})`,
      reports
    );
  }

  private logRetryEvent(strategy: string, event: RetryEvent): void {
    if (event.type === 'retrying') {
      this.logger.warn('Transient completion failure, retrying', {
        strategy,
        attempt: event.attemptNumber,
        maxRetries: event.maxRetries,
        delayMs: event.nextDelayMs,
        error: event.error?.message,
      });
    } else if (event.type === 'attempt_start') {
      this.logger.debug('Completion attempt', { strategy, attempt: event.attemptNumber });
    }
  }
}
