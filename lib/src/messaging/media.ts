/**
 * Media download for inbound attachments.
 */

import axios from 'axios';

import { MessagingError, MessagingErrorCode } from './types.js';

export interface MediaDownloadOptions {
  accountSid: string;
  authToken: string;
  timeoutMs: number;
}

/**
 * Fetches a Twilio media URL with account basic auth.
 *
 * @throws {MessagingError} MEDIA_DOWNLOAD_FAILED
 */
export async function downloadMedia(url: string, options: MediaDownloadOptions): Promise<Buffer> {
  try {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: options.timeoutMs,
      auth: { username: options.accountSid, password: options.authToken },
      maxRedirects: 5,
    });
    return Buffer.from(response.data);
  } catch (error) {
    throw new MessagingError(
      `Failed to download media: ${error instanceof Error ? error.message : String(error)}`,
      MessagingErrorCode.MEDIA_DOWNLOAD_FAILED,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}
