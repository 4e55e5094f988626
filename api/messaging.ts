/**
 * Messaging Webhook Endpoint
 *
 * POST /api/messaging (Twilio webhook, application/x-www-form-urlencoded)
 *
 * - "quiz", "link" or "active" → replies with the active quiz link
 * - a PDF attachment → runs the pipeline and replies with the new form link;
 *   tokens in the message body pick the language and question count ("he 8")
 *
 * Replies go out through the REST API; the webhook itself always answers
 * with an empty TwiML document.
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';

import {
  type InboundMessage,
  type MessageCommand,
  type PipelineResult,
  downloadMedia,
  isMessagingError,
  parseInboundMessage,
  parseMessageCommand,
} from '../lib/src/index.js';
import { generateRequestId } from './_lib/http.js';
import { type Services, getServicesOrRespond } from './_lib/services.js';

export const EMPTY_TWIML = '<?xml version="1.0" encoding="UTF-8"?><Response/>';

export const HELP_MESSAGE =
  "Send a PDF to generate a quiz. Add 'he' for Hebrew or a number for the question count. Send 'quiz' for the active quiz link.";

const PDF_CONTENT_TYPE = 'application/pdf';

function sendTwiml(res: VercelResponse): void {
  res.setHeader('Content-Type', 'text/xml');
  res.status(200).send(EMPTY_TWIML);
}

export function formatPipelineReply(result: PipelineResult): string {
  if (!result.ok) {
    return `Quiz generation failed: ${result.error.message}`;
  }
  if (result.formEditUrl === null) {
    return `Generated ${result.summary.processed} questions, but the form could not be created.`;
  }
  return `Your quiz with ${result.summary.processed} questions is ready: ${result.formEditUrl}`;
}

/**
 * Works out the reply for one inbound message.
 */
export async function buildReply(
  message: InboundMessage,
  command: MessageCommand,
  services: Services
): Promise<string> {
  const { config, orchestrator, pointer } = services;

  if (message.media === undefined) {
    if (command.kind === 'active') {
      const url = await pointer.resolveRedirect('form');
      return url === null ? 'No active quiz is set.' : `Active quiz: ${url}`;
    }
    return HELP_MESSAGE;
  }

  const contentType = message.media.contentType;
  if (contentType !== undefined && !contentType.startsWith(PDF_CONTENT_TYPE)) {
    return 'Only PDF attachments are supported.';
  }

  if (config.twilio === undefined) {
    return 'Media downloads are not configured.';
  }

  const pdfBuffer = await downloadMedia(message.media.url, {
    accountSid: config.twilio.accountSid,
    authToken: config.twilio.authToken,
    timeoutMs: config.twilio.downloadTimeoutMs,
  });

  const result = await orchestrator.run({
    pdfBuffer,
    filename: `message_${Date.now()}.pdf`,
    language: command.kind === 'generate' ? command.language : undefined,
    numQuestions: command.kind === 'generate' ? command.numQuestions : undefined,
  });

  return formatPipelineReply(result);
}

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  const requestId = generateRequestId('messaging');
  const services = getServicesOrRespond(res, requestId);
  if (!services) {
    return;
  }
  const { logger, messaging } = services;

  if (req.method !== 'POST') {
    res.status(405).json({ error: { message: 'Method not allowed', code: 'METHOD_NOT_ALLOWED', requestId } });
    return;
  }

  try {
    const message = parseInboundMessage(req.body);
    const command = parseMessageCommand(message.body);
    logger.info('Inbound message', {
      requestId,
      sender: message.sender,
      command: command.kind,
      hasMedia: message.media !== undefined,
    });

    if (messaging === null) {
      logger.warn('Messaging client is not configured; no reply sent', { requestId });
    } else {
      let reply: string;
      try {
        reply = await buildReply(message, command, services);
      } catch (error) {
        logger.error('Failed to process inbound message', error, { requestId });
        reply = isMessagingError(error)
          ? 'Could not download the attachment. Please try again.'
          : 'Something went wrong while processing your message.';
      }
      await messaging.sendMessage(message.sender, reply);
    }
  } catch (error) {
    logger.error('Messaging webhook error', error, { requestId });
  }

  sendTwiml(res);
}
