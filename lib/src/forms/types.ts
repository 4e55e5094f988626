/**
 * Forms Publisher Types
 */

import { z } from 'zod';

import type { FormRequest } from '../quiz/index.js';

export const FORMS_SCOPES = [
  'https://www.googleapis.com/auth/forms.body',
  'https://www.googleapis.com/auth/forms.responses.readonly',
  'https://www.googleapis.com/auth/drive',
] as const;

export function formEditUrl(formId: string): string {
  return `https://docs.google.com/forms/d/${formId}/edit`;
}

// =============================================================================
// Credentials
// =============================================================================

/**
 * Lifecycle of a stored credential: load it, check it, refresh it when
 * stale, and write it back.
 */
export interface CredentialStore<C> {
  /** Null when nothing is stored or the stored value is unreadable */
  load(): Promise<C | null>;
  isValid(credentials: C): boolean;
  refresh(credentials: C): Promise<C>;
  persist(credentials: C): Promise<void>;
}

/**
 * OAuth token file contents, as written by the token store.
 */
export const StoredTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().nullish(),
  id_token: z.string().nullish(),
});

export type StoredToken = z.infer<typeof StoredTokenSchema>;

const OAuthClientSectionSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * `client_secret.json` as downloaded from the Google Cloud console, for
 * either an installed or a web application.
 */
export const ClientSecretFileSchema = z
  .object({
    installed: OAuthClientSectionSchema.optional(),
    web: OAuthClientSectionSchema.optional(),
  })
  .refine((value) => value.installed !== undefined || value.web !== undefined, {
    message: 'client secret file must contain an "installed" or "web" section',
  });

export interface OAuthClientSecret {
  clientId: string;
  clientSecret: string;
  redirectUri?: string | undefined;
}

// =============================================================================
// Publishing
// =============================================================================

export type ShareRole = 'writer' | 'commenter' | 'reader';

export interface FormInfo {
  title: string;
  documentTitle: string;
}

export interface PublishedQuiz {
  formId: string;
  formEditUrl: string;
  responderUrl: string | null;
  quizModeEnabled: boolean;
}

export interface FormsPublisher {
  /**
   * Creates a form, switches it to quiz mode and applies the item requests.
   */
  createQuiz(info: FormInfo, requests: FormRequest[]): Promise<PublishedQuiz>;
  shareWithUser(fileId: string, email: string, role?: ShareRole): Promise<void>;
}

// =============================================================================
// Error Classes
// =============================================================================

export const FormsAuthErrorCode = {
  TOKEN_NOT_FOUND: 'TOKEN_NOT_FOUND',
  CLIENT_SECRET_INVALID: 'CLIENT_SECRET_INVALID',
  SERVICE_ACCOUNT_NOT_FOUND: 'SERVICE_ACCOUNT_NOT_FOUND',
  REFRESH_FAILED: 'REFRESH_FAILED',
} as const;

export type FormsAuthErrorCode = (typeof FormsAuthErrorCode)[keyof typeof FormsAuthErrorCode];

export class FormsAuthError extends Error {
  readonly code: FormsAuthErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: FormsAuthErrorCode, options?: { cause?: Error | undefined }) {
    super(message);
    this.name = 'FormsAuthError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FormsAuthError);
    }
  }
}

export const FormsPublishErrorCode = {
  CREATE_FAILED: 'CREATE_FAILED',
  BATCH_UPDATE_FAILED: 'BATCH_UPDATE_FAILED',
  SHARE_FAILED: 'SHARE_FAILED',
} as const;

export type FormsPublishErrorCode =
  (typeof FormsPublishErrorCode)[keyof typeof FormsPublishErrorCode];

export class FormsPublishError extends Error {
  readonly code: FormsPublishErrorCode;
  /** Set when the form exists but a later step failed */
  readonly formId: string | undefined;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: FormsPublishErrorCode,
    options?: { formId?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'FormsPublishError';
    this.code = code;
    this.formId = options?.formId;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FormsPublishError);
    }
  }

  static fromError(error: unknown, code: FormsPublishErrorCode, formId?: string): FormsPublishError {
    if (error instanceof FormsPublishError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new FormsPublishError(message, code, {
      formId,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export function isFormsAuthError(error: unknown): error is FormsAuthError {
  return error instanceof FormsAuthError;
}

export function isFormsPublishError(error: unknown): error is FormsPublishError {
  return error instanceof FormsPublishError;
}
