/**
 * Unit Tests for inbound message parsing
 */

import { describe, it, expect } from 'vitest';
import {
  MessagingError,
  MessagingErrorCode,
  parseInboundMessage,
  parseMessageCommand,
} from '../../lib/src/messaging/index.js';

describe('parseInboundMessage', () => {
  it('should read a text-only message', () => {
    expect(parseInboundMessage({ From: 'whatsapp:+15550001111', Body: '  quiz  ', NumMedia: '0' })).toEqual({
      sender: 'whatsapp:+15550001111',
      body: 'quiz',
      media: undefined,
    });
  });

  it('should read the first media attachment', () => {
    const message = parseInboundMessage({
      From: 'whatsapp:+15550001111',
      Body: 'he 8',
      NumMedia: '1',
      MediaUrl0: 'https://api.twilio.com/media/ME123',
      MediaContentType0: 'application/pdf',
      AccountSid: 'ignored',
    });

    expect(message.media).toEqual({
      url: 'https://api.twilio.com/media/ME123',
      contentType: 'application/pdf',
    });
  });

  it('should ignore a media URL when NumMedia is zero', () => {
    const message = parseInboundMessage({
      From: '+15550001111',
      NumMedia: '0',
      MediaUrl0: 'https://api.twilio.com/media/ME123',
    });

    expect(message.media).toBeUndefined();
    expect(message.body).toBe('');
  });

  it('should reject a payload without a sender', () => {
    let caught: unknown;
    try {
      parseInboundMessage({ Body: 'hello' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MessagingError);
    expect(caught).toMatchObject({ code: MessagingErrorCode.INVALID_WEBHOOK });
  });
});

describe('parseMessageCommand', () => {
  it.each(['quiz', 'LINK', ' active '])('should read "%s" as the active form command', (body) => {
    expect(parseMessageCommand(body)).toEqual({ kind: 'active' });
  });

  it('should read an empty body as a default generation request', () => {
    expect(parseMessageCommand('')).toEqual({ kind: 'generate' });
  });

  it('should read language and count in either order', () => {
    expect(parseMessageCommand('he 8')).toEqual({ kind: 'generate', language: 'he', numQuestions: 8 });
    expect(parseMessageCommand('10 english')).toEqual({ kind: 'generate', language: 'en', numQuestions: 10 });
  });

  it('should clamp the count', () => {
    expect(parseMessageCommand('50')).toEqual({ kind: 'generate', numQuestions: 20 });
    expect(parseMessageCommand('0')).toEqual({ kind: 'generate', numQuestions: 1 });
  });

  it('should treat "quiz" with other words as a generation request', () => {
    expect(parseMessageCommand('quiz hebrew')).toEqual({ kind: 'generate', language: 'he' });
  });

  it('should ignore unrecognised words', () => {
    expect(parseMessageCommand('please make it 5')).toEqual({ kind: 'generate', numQuestions: 5 });
  });
});
