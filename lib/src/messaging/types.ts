/**
 * Messaging Types
 *
 * Inbound webhook payloads, the commands they carry, and the outbound
 * client contract.
 */

import { z } from 'zod';

import type { QuizLanguage } from '../quiz/index.js';

export interface MessagingClient {
  sendMessage(to: string, body: string): Promise<{ sid: string }>;
}

/**
 * Twilio webhook fields this service reads. Twilio posts many more; they are
 * ignored.
 */
export const InboundWebhookSchema = z
  .object({
    From: z.string().min(1),
    Body: z.string().default(''),
    NumMedia: z.coerce.number().int().nonnegative().default(0),
    MediaUrl0: z.string().url().optional(),
    MediaContentType0: z.string().optional(),
  })
  .passthrough();

export interface InboundMedia {
  url: string;
  contentType: string | undefined;
}

export interface InboundMessage {
  sender: string;
  body: string;
  media?: InboundMedia | undefined;
}

export type MessageCommand =
  | { kind: 'active' }
  | {
      kind: 'generate';
      language?: QuizLanguage | undefined;
      numQuestions?: number | undefined;
    };

export const MessagingErrorCode = {
  INVALID_WEBHOOK: 'INVALID_WEBHOOK',
  SEND_FAILED: 'SEND_FAILED',
  MEDIA_DOWNLOAD_FAILED: 'MEDIA_DOWNLOAD_FAILED',
} as const;

export type MessagingErrorCode = (typeof MessagingErrorCode)[keyof typeof MessagingErrorCode];

export class MessagingError extends Error {
  readonly code: MessagingErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: MessagingErrorCode, options?: { cause?: Error | undefined }) {
    super(message);
    this.name = 'MessagingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MessagingError);
    }
  }
}

export function isMessagingError(error: unknown): error is MessagingError {
  return error instanceof MessagingError;
}
