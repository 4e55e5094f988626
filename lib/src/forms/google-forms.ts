/**
 * Google Forms Publisher
 *
 * Creates the quiz form through the Forms API and shares it over Drive.
 */

import { google, type Auth, type drive_v3, type forms_v1 } from 'googleapis';

import {
  type FormInfo,
  type FormsPublisher,
  type PublishedQuiz,
  type ShareRole,
  FormsPublishError,
  FormsPublishErrorCode,
  formEditUrl,
} from './types.js';
import type { FormRequest } from '../quiz/index.js';
import { type Logger, createLogger } from '../logging/index.js';

const QUIZ_MODE_REQUEST: FormRequest = {
  updateSettings: {
    settings: { quizSettings: { isQuiz: true } },
    updateMask: 'quizSettings.isQuiz',
  },
};

export interface GoogleFormsPublisherDependencies {
  forms: forms_v1.Forms;
  drive: drive_v3.Drive;
  logger?: Logger | undefined;
}

export class GoogleFormsPublisher implements FormsPublisher {
  private readonly forms: forms_v1.Forms;
  private readonly drive: drive_v3.Drive;
  private readonly logger: Logger;

  constructor(dependencies: GoogleFormsPublisherDependencies) {
    this.forms = dependencies.forms;
    this.drive = dependencies.drive;
    this.logger = dependencies.logger ?? createLogger('forms');
  }

  static fromAuth(auth: Auth.OAuth2Client, logger?: Logger): GoogleFormsPublisher {
    return new GoogleFormsPublisher({
      forms: google.forms({ version: 'v1', auth }),
      drive: google.drive({ version: 'v3', auth }),
      logger,
    });
  }

  /**
   * Creates an empty form, enables quiz mode and sends the item requests in
   * one batch. A quiz-mode failure is logged and reported through
   * `quizModeEnabled`; the items are still added.
   *
   * @throws {FormsPublishError} CREATE_FAILED or BATCH_UPDATE_FAILED
   */
  async createQuiz(info: FormInfo, requests: FormRequest[]): Promise<PublishedQuiz> {
    let form: forms_v1.Schema$Form;
    try {
      const response = await this.forms.forms.create({
        requestBody: { info: { title: info.title, documentTitle: info.documentTitle } },
      });
      form = response.data;
    } catch (error) {
      throw FormsPublishError.fromError(error, FormsPublishErrorCode.CREATE_FAILED);
    }

    const formId = form.formId;
    if (!formId) {
      throw new FormsPublishError('Form created without an id', FormsPublishErrorCode.CREATE_FAILED);
    }
    this.logger.info('Form created', { formId });

    let quizModeEnabled = true;
    try {
      await this.forms.forms.batchUpdate({
        formId,
        requestBody: { requests: [QUIZ_MODE_REQUEST] },
      });
    } catch (error) {
      quizModeEnabled = false;
      this.logger.warn('Failed to enable quiz mode; continuing', {
        formId,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (requests.length > 0) {
      try {
        await this.forms.forms.batchUpdate({ formId, requestBody: { requests } });
      } catch (error) {
        throw FormsPublishError.fromError(error, FormsPublishErrorCode.BATCH_UPDATE_FAILED, formId);
      }
      this.logger.info('Batch update completed', { formId, requests: requests.length });
    } else {
      this.logger.warn('No requests to send', { formId });
    }

    return {
      formId,
      formEditUrl: formEditUrl(formId),
      responderUrl: form.responderUri ?? null,
      quizModeEnabled,
    };
  }

  /**
   * @throws {FormsPublishError} SHARE_FAILED
   */
  async shareWithUser(fileId: string, email: string, role: ShareRole = 'writer'): Promise<void> {
    try {
      await this.drive.permissions.create({
        fileId,
        requestBody: { type: 'user', role, emailAddress: email },
        sendNotificationEmail: false,
      });
    } catch (error) {
      throw FormsPublishError.fromError(error, FormsPublishErrorCode.SHARE_FAILED, fileId);
    }
    this.logger.info('Form shared', { fileId, email, role });
  }
}
