/**
 * Twilio Messaging Client
 */

import twilio from 'twilio';

import {
  type MessagingClient,
  MessagingError,
  MessagingErrorCode,
} from './types.js';
import { type Logger, createLogger } from '../logging/index.js';

export interface TwilioMessagingConfig {
  accountSid: string;
  authToken: string;
  /** Sender number, e.g. `whatsapp:+15550000000` */
  from: string;
}

/**
 * The slice of the Twilio REST client used here.
 */
export interface TwilioMessagesApi {
  messages: {
    create(params: { from: string; to: string; body: string }): Promise<{ sid: string }>;
  };
}

export class TwilioMessagingClient implements MessagingClient {
  private readonly client: TwilioMessagesApi;
  private readonly from: string;
  private readonly logger: Logger;

  constructor(
    config: TwilioMessagingConfig,
    options: { client?: TwilioMessagesApi | undefined; logger?: Logger | undefined } = {}
  ) {
    this.client = options.client ?? twilio(config.accountSid, config.authToken);
    this.from = config.from;
    this.logger = options.logger ?? createLogger('messaging');
  }

  /**
   * @throws {MessagingError} SEND_FAILED
   */
  async sendMessage(to: string, body: string): Promise<{ sid: string }> {
    try {
      const message = await this.client.messages.create({ from: this.from, to, body });
      this.logger.info('Message sent', { to, sid: message.sid });
      return { sid: message.sid };
    } catch (error) {
      throw new MessagingError(
        `Failed to send message: ${error instanceof Error ? error.message : String(error)}`,
        MessagingErrorCode.SEND_FAILED,
        { cause: error instanceof Error ? error : undefined }
      );
    }
  }
}
