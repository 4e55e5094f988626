/**
 * Unit Tests for Completion Strategies
 *
 * The OpenAI client is replaced by a stub exposing only the endpoints the
 * strategies call; SDK error classes are the real ones.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import {
  ChatCompletionStrategy,
  ResponsesJsonStrategy,
  classifyError,
  createDefaultStrategies,
  mapOpenAIError,
  type OpenAIClient,
} from '../../lib/src/llm/strategies.js';
import {
  AuthenticationError,
  IncompatibleRequestError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from '../../lib/src/llm/errors.js';
import { LLMProvider, type CompletionRequest } from '../../lib/src/llm/types.js';

// =============================================================================
// Fixtures
// =============================================================================

const request: CompletionRequest = {
  model: 'gpt-4.1',
  messages: [
    { role: 'system', content: 'Return JSON.' },
    { role: 'user', content: 'Source text' },
  ],
};

const attemptOptions = { timeoutMs: 120_000 };

function createStubClient() {
  const responsesCreate = vi.fn();
  const chatCreate = vi.fn();
  const client = {
    responses: { create: responsesCreate },
    chat: { completions: { create: chatCreate } },
  } as unknown as OpenAIClient;
  return { client, responsesCreate, chatCreate };
}

function apiError(status: number, message: string, headers: Record<string, string> = {}) {
  return OpenAI.APIError.generate(status, { error: { message } }, undefined, headers);
}

// =============================================================================
// Error Mapping
// =============================================================================

describe('mapOpenAIError', () => {
  it('should map 401 and 403 to AuthenticationError', () => {
    expect(mapOpenAIError(apiError(401, 'Incorrect API key'))).toBeInstanceOf(AuthenticationError);
    expect(mapOpenAIError(apiError(403, 'Forbidden'))).toBeInstanceOf(AuthenticationError);
  });

  it('should map 429 to RateLimitError with the retry-after header', () => {
    const mapped = mapOpenAIError(apiError(429, 'Too many requests', { 'retry-after': '2' }));

    expect(mapped).toBeInstanceOf(RateLimitError);
    expect(mapped.retryAfterMs).toBe(2000);
  });

  it('should map 400 and 422 to IncompatibleRequestError', () => {
    expect(mapOpenAIError(apiError(400, "Unsupported parameter: 'text.format'"))).toBeInstanceOf(
      IncompatibleRequestError
    );
    expect(mapOpenAIError(apiError(422, 'Unprocessable'))).toBeInstanceOf(IncompatibleRequestError);
  });

  it('should split 404 between a missing model and a missing endpoint', () => {
    expect(mapOpenAIError(apiError(404, 'The model `gpt-x` does not exist'))).toBeInstanceOf(
      ModelNotFoundError
    );
    expect(mapOpenAIError(apiError(404, 'Not found'))).toBeInstanceOf(IncompatibleRequestError);
  });

  it('should map 408 and 5xx to retryable errors', () => {
    expect(mapOpenAIError(apiError(408, 'Timeout'))).toBeInstanceOf(TimeoutError);
    expect(mapOpenAIError(apiError(503, 'Overloaded'))).toBeInstanceOf(ServerError);
  });

  it('should map connection errors', () => {
    expect(mapOpenAIError(new OpenAI.APIConnectionTimeoutError())).toBeInstanceOf(TimeoutError);
    expect(mapOpenAIError(new OpenAI.APIConnectionError({ message: 'ECONNRESET' }))).toBeInstanceOf(
      NetworkError
    );
  });

  it('should pass LLM errors through', () => {
    const error = new ServerError('down', LLMProvider.OPENAI);
    expect(mapOpenAIError(error)).toBe(error);
  });
});

describe('classifyError', () => {
  it('should tag fatal, transient and incompatible failures', () => {
    expect(classifyError(apiError(401, 'bad key')).kind).toBe('fatal');
    expect(classifyError(apiError(500, 'oops')).kind).toBe('transient');
    expect(classifyError(apiError(400, 'unsupported')).kind).toBe('incompatible');
  });

  it('should treat an unknown error as incompatible', () => {
    expect(classifyError(new TypeError('responses.create is not a function'))).toEqual({
      kind: 'incompatible',
      reason: 'responses.create is not a function',
    });
  });
});

// =============================================================================
// Strategies
// =============================================================================

describe('ResponsesJsonStrategy', () => {
  let stub: ReturnType<typeof createStubClient>;

  beforeEach(() => {
    stub = createStubClient();
  });

  it('should send system messages as instructions and request a JSON object', async () => {
    stub.responsesCreate.mockResolvedValue({ output_text: '{"questions":[]}', model: 'gpt-4.1-2025' });
    const strategy = new ResponsesJsonStrategy(stub.client);

    const outcome = await strategy.attempt(request, attemptOptions);

    expect(outcome).toEqual({ kind: 'success', text: '{"questions":[]}', model: 'gpt-4.1-2025' });
    expect(stub.responsesCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4.1',
        instructions: 'Return JSON.',
        input: 'Source text',
        text: { format: { type: 'json_object' } },
      },
      { timeout: 120_000, signal: undefined }
    );
  });

  it('should fall back to the requested model name', async () => {
    stub.responsesCreate.mockResolvedValue({ output_text: '{}', model: '' });

    const outcome = await new ResponsesJsonStrategy(stub.client).attempt(request, attemptOptions);

    expect(outcome).toEqual({ kind: 'success', text: '{}', model: 'gpt-4.1' });
  });

  it('should report an empty response as incompatible', async () => {
    stub.responsesCreate.mockResolvedValue({ output_text: '   ', model: 'gpt-4.1' });

    const outcome = await new ResponsesJsonStrategy(stub.client).attempt(request, attemptOptions);

    expect(outcome).toEqual({ kind: 'incompatible', reason: 'Response contained no text' });
  });

  it('should classify SDK failures', async () => {
    stub.responsesCreate.mockRejectedValue(apiError(503, 'Overloaded'));

    const outcome = await new ResponsesJsonStrategy(stub.client).attempt(request, attemptOptions);

    expect(outcome.kind).toBe('transient');
  });
});

describe('ChatCompletionStrategy', () => {
  it('should request json_object in JSON mode', async () => {
    const stub = createStubClient();
    stub.chatCreate.mockResolvedValue({
      model: 'gpt-4.1',
      choices: [{ message: { content: '{"a":1}' } }],
    });
    const strategy = new ChatCompletionStrategy(stub.client, true);

    const outcome = await strategy.attempt(request, attemptOptions);

    expect(strategy.name).toBe('chat_json');
    expect(outcome).toEqual({ kind: 'success', text: '{"a":1}', model: 'gpt-4.1' });
    expect(stub.chatCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4.1',
        messages: [
          { role: 'system', content: 'Return JSON.' },
          { role: 'user', content: 'Source text' },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      },
      { timeout: 120_000, signal: undefined }
    );
  });

  it('should omit response_format in plain mode', async () => {
    const stub = createStubClient();
    stub.chatCreate.mockResolvedValue({ model: 'gpt-4.1', choices: [{ message: { content: 'text' } }] });
    const strategy = new ChatCompletionStrategy(stub.client, false);

    await strategy.attempt(request, attemptOptions);

    expect(strategy.name).toBe('chat_plain');
    const params: unknown = stub.chatCreate.mock.calls[0]?.[0];
    expect(params).not.toHaveProperty('response_format');
  });

  it('should report a response without choices as incompatible', async () => {
    const stub = createStubClient();
    stub.chatCreate.mockResolvedValue({ model: 'gpt-4.1', choices: [] });

    const outcome = await new ChatCompletionStrategy(stub.client, true).attempt(request, attemptOptions);

    expect(outcome.kind).toBe('incompatible');
  });
});

describe('createDefaultStrategies', () => {
  it('should order the ladder responses_json, chat_json, chat_plain', () => {
    const { client } = createStubClient();
    expect(createDefaultStrategies(client).map((s) => s.name)).toEqual([
      'responses_json',
      'chat_json',
      'chat_plain',
    ]);
  });

  it('should build only the strategies named in a custom order', () => {
    const { client } = createStubClient();
    const strategies = createDefaultStrategies(client, ['chat_plain', 'responses_json']);

    expect(strategies.map((s) => s.name)).toEqual(['chat_plain', 'responses_json']);
    expect(strategies[0]).toBeInstanceOf(ChatCompletionStrategy);
    expect(strategies[1]).toBeInstanceOf(ResponsesJsonStrategy);
  });
});
