/**
 * Completion Strategies
 *
 * One strategy per OpenAI API shape. Each adapts its SDK response into a
 * tagged {@link StrategyOutcome}; none of them retries or throws.
 */

import OpenAI from 'openai';

import {
  type CompletionRequest,
  type CompletionStrategy,
  type LLMMessage,
  type StrategyAttemptOptions,
  type StrategyOutcome,
  COMPLETION_STRATEGY_ORDER,
  CompletionStrategyName,
  LLMProvider,
} from './types.js';
import {
  AuthenticationError,
  IncompatibleRequestError,
  LLMError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
  isFatalCompletionError,
} from './errors.js';

type ChatCompletionMessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ChatCompletionCreateParamsNonStreaming = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

/**
 * The parts of the OpenAI client the strategies call.
 */
export type OpenAIClient = Pick<OpenAI, 'responses' | 'chat'>;

// =============================================================================
// Error Mapping
// =============================================================================

function extractRetryAfter(error: InstanceType<typeof OpenAI.APIError>): number | undefined {
  const retryAfter = error.headers?.['retry-after'];
  if (typeof retryAfter !== 'string') {
    return undefined;
  }
  const seconds = parseFloat(retryAfter);
  return isNaN(seconds) ? undefined : Math.round(seconds * 1000);
}

/**
 * Maps an OpenAI SDK error onto the LLMError hierarchy.
 *
 * Connection errors are checked first: the SDK derives them from APIError.
 */
export function mapOpenAIError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TimeoutError(`Request timeout: ${error.message}`, LLMProvider.OPENAI, undefined, error);
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new NetworkError(`Connection error: ${error.message}`, LLMProvider.OPENAI, undefined, error);
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const message = error.message;

    if (status === 401 || status === 403) {
      return new AuthenticationError(`Authentication failed: ${message}`, LLMProvider.OPENAI, error);
    }

    if (status === 429) {
      return new RateLimitError(
        `Rate limit exceeded: ${message}`,
        LLMProvider.OPENAI,
        extractRetryAfter(error),
        error
      );
    }

    if (status === 400 || status === 422) {
      return new IncompatibleRequestError(`Request not supported: ${message}`, LLMProvider.OPENAI, error);
    }

    if (status === 404) {
      return /model/i.test(message)
        ? new ModelNotFoundError(`Model not found: ${message}`, LLMProvider.OPENAI, error)
        : new IncompatibleRequestError(`Endpoint not found: ${message}`, LLMProvider.OPENAI, error);
    }

    if (status === 408) {
      return new TimeoutError(`Request timeout: ${message}`, LLMProvider.OPENAI, undefined, error);
    }

    if (status !== undefined && status >= 500) {
      return new ServerError(`Server error: ${message}`, LLMProvider.OPENAI, undefined, error);
    }
  }

  return LLMError.fromError(error, LLMProvider.OPENAI);
}

/**
 * Tags a failed attempt. Anything neither fatal nor retryable (including a
 * TypeError from an SDK without the endpoint) means "try the next shape".
 */
export function classifyError(error: unknown): StrategyOutcome {
  const mapped = mapOpenAIError(error);

  if (isFatalCompletionError(mapped)) {
    return { kind: 'fatal', error: mapped };
  }
  if (mapped.retryable) {
    return { kind: 'transient', error: mapped };
  }
  return { kind: 'incompatible', reason: mapped.message };
}

function toOutcome(text: string | null | undefined, model: string): StrategyOutcome {
  if (typeof text !== 'string' || text.trim().length === 0) {
    return { kind: 'incompatible', reason: 'Response contained no text' };
  }
  return { kind: 'success', text, model };
}

// =============================================================================
// Strategies
// =============================================================================

function convertMessages(messages: LLMMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
    }
  });
}

/**
 * Responses API with a JSON object output format. System messages become
 * `instructions`; the rest are joined into the input text.
 */
export class ResponsesJsonStrategy implements CompletionStrategy {
  readonly name = CompletionStrategyName.RESPONSES_JSON;

  constructor(private readonly client: OpenAIClient) {}

  async attempt(
    request: CompletionRequest,
    options: StrategyAttemptOptions
  ): Promise<StrategyOutcome> {
    const instructions = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const input = request.messages
      .filter((m) => m.role !== 'system')
      .map((m) => m.content)
      .join('\n\n');

    try {
      const response = await this.client.responses.create(
        {
          model: request.model,
          instructions: instructions.length > 0 ? instructions : null,
          input,
          text: { format: { type: 'json_object' } },
        },
        { timeout: options.timeoutMs, signal: options.signal }
      );
      return toOutcome(response.output_text, response.model || request.model);
    } catch (error) {
      return classifyError(error);
    }
  }
}

/**
 * Chat Completions at temperature 0, with or without
 * `response_format: json_object`.
 */
export class ChatCompletionStrategy implements CompletionStrategy {
  readonly name: CompletionStrategyName;

  constructor(
    private readonly client: OpenAIClient,
    private readonly jsonMode: boolean
  ) {
    this.name = jsonMode ? CompletionStrategyName.CHAT_JSON : CompletionStrategyName.CHAT_PLAIN;
  }

  async attempt(
    request: CompletionRequest,
    options: StrategyAttemptOptions
  ): Promise<StrategyOutcome> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: convertMessages(request.messages),
      temperature: 0,
    };
    if (this.jsonMode) {
      params.response_format = { type: 'json_object' };
    }

    try {
      const completion = await this.client.chat.completions.create(params, {
        timeout: options.timeoutMs,
        signal: options.signal,
      });
      return toOutcome(completion.choices[0]?.message.content, completion.model || request.model);
    } catch (error) {
      return classifyError(error);
    }
  }
}

export function createStrategy(name: CompletionStrategyName, client: OpenAIClient): CompletionStrategy {
  switch (name) {
    case CompletionStrategyName.RESPONSES_JSON:
      return new ResponsesJsonStrategy(client);
    case CompletionStrategyName.CHAT_JSON:
      return new ChatCompletionStrategy(client, true);
    case CompletionStrategyName.CHAT_PLAIN:
      return new ChatCompletionStrategy(client, false);
  }
}

/**
 * The default ladder, in {@link COMPLETION_STRATEGY_ORDER}.
 */
export function createDefaultStrategies(
  client: OpenAIClient,
  order: readonly CompletionStrategyName[] = COMPLETION_STRATEGY_ORDER
): CompletionStrategy[] {
  return order.map((name) => createStrategy(name, client));
}
