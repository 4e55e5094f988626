/**
 * Inbound message parsing.
 */

import {
  type InboundMessage,
  type MessageCommand,
  InboundWebhookSchema,
  MessagingError,
  MessagingErrorCode,
} from './types.js';
import { clampNumQuestions, parseLanguageToken } from '../quiz/index.js';

const ACTIVE_FORM_COMMANDS: ReadonlySet<string> = new Set(['quiz', 'link', 'active']);

/**
 * @throws {MessagingError} INVALID_WEBHOOK when required fields are missing
 */
export function parseInboundMessage(fields: Record<string, unknown>): InboundMessage {
  const parsed = InboundWebhookSchema.safeParse(fields);
  if (!parsed.success) {
    throw new MessagingError(
      `Invalid webhook payload: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      MessagingErrorCode.INVALID_WEBHOOK
    );
  }

  const { From, Body, NumMedia, MediaUrl0, MediaContentType0 } = parsed.data;

  return {
    sender: From,
    body: Body.trim(),
    media:
      NumMedia > 0 && MediaUrl0 !== undefined
        ? { url: MediaUrl0, contentType: MediaContentType0 }
        : undefined,
  };
}

/**
 * `quiz`, `link` or `active` ask for the current quiz. Anything else is a
 * generation request whose tokens may name a language and a count, in
 * either order: `he 8`, `10 english`.
 */
export function parseMessageCommand(body: string): MessageCommand {
  const tokens = body.trim().toLowerCase().split(/\s+/).filter((t) => t.length > 0);

  const first = tokens[0];
  if (first !== undefined && tokens.length === 1 && ACTIVE_FORM_COMMANDS.has(first)) {
    return { kind: 'active' };
  }

  const command: Extract<MessageCommand, { kind: 'generate' }> = { kind: 'generate' };
  for (const token of tokens) {
    const language = parseLanguageToken(token);
    if (language !== undefined) {
      command.language = language;
    } else if (/^\d+$/.test(token)) {
      command.numQuestions = clampNumQuestions(token);
    }
  }
  return command;
}
