/**
 * Messaging Module
 *
 * Twilio webhook parsing, outbound messages and media download.
 */

export * from './types.js';
export * from './inbound.js';
export * from './media.js';
export * from './twilio-client.js';
