/**
 * Google Credentials
 *
 * OAuth token storage and refresh, and the choice between user OAuth and a
 * service account. Interactive consent is out of scope: a token file must
 * already exist for OAuth mode.
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { google, type Auth } from 'googleapis';

import {
  type CredentialStore,
  type OAuthClientSecret,
  ClientSecretFileSchema,
  FORMS_SCOPES,
  FormsAuthError,
  FormsAuthErrorCode,
  StoredTokenSchema,
} from './types.js';
import type { AppConfig } from '../config/index.js';
import { type Logger, createLogger } from '../logging/index.js';

export const CLOUD_TOKEN_PATH = '/secrets/token.json';
export const LOCAL_TOKEN_PATH = 'token.json';

/** Tokens this close to expiry are treated as expired */
const EXPIRY_SKEW_MS = 60_000;

/**
 * The configured path wins; otherwise the mounted secret when present,
 * else `token.json` in the working directory.
 */
export function resolveTokenPath(
  configured?: string,
  exists: (path: string) => boolean = existsSync
): string {
  if (configured) {
    return configured;
  }
  return exists(CLOUD_TOKEN_PATH) ? CLOUD_TOKEN_PATH : LOCAL_TOKEN_PATH;
}

/**
 * @throws {FormsAuthError} CLIENT_SECRET_INVALID when the file is missing or malformed
 */
export async function loadClientSecret(path: string): Promise<OAuthClientSecret> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new FormsAuthError(
      `OAuth client secret file not readable: ${path}`,
      FormsAuthErrorCode.CLIENT_SECRET_INVALID,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  const parsed = ClientSecretFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormsAuthError(
      `Invalid OAuth client secret file ${path}: ${parsed.error.issues.map((i) => i.message).join(', ')}`,
      FormsAuthErrorCode.CLIENT_SECRET_INVALID
    );
  }

  const section = parsed.data.installed ?? parsed.data.web;
  if (section === undefined) {
    throw new FormsAuthError(
      `Invalid OAuth client secret file ${path}`,
      FormsAuthErrorCode.CLIENT_SECRET_INVALID
    );
  }

  return {
    clientId: section.client_id,
    clientSecret: section.client_secret,
    redirectUri: section.redirect_uris?.[0],
  };
}

/**
 * The parts of an OAuth2 client the token store drives.
 */
export interface TokenRefreshClient {
  credentials: Auth.Credentials;
  setCredentials(credentials: Auth.Credentials): void;
  getAccessToken(): Promise<{ token?: string | null | undefined }>;
}

/**
 * Keeps OAuth user credentials in a JSON file.
 */
export class FileTokenStore implements CredentialStore<Auth.Credentials> {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly tokenPath: string,
    private readonly client: TokenRefreshClient,
    options: { logger?: Logger | undefined; now?: (() => number) | undefined } = {}
  ) {
    this.logger = options.logger ?? createLogger('forms');
    this.now = options.now ?? Date.now;
  }

  async load(): Promise<Auth.Credentials | null> {
    if (!existsSync(this.tokenPath)) {
      return null;
    }

    try {
      const parsed = StoredTokenSchema.safeParse(JSON.parse(await readFile(this.tokenPath, 'utf-8')));
      if (!parsed.success) {
        this.logger.warn('Token file has an unexpected shape', { path: this.tokenPath });
        return null;
      }

      const token = parsed.data;
      return {
        access_token: token.access_token,
        refresh_token: token.refresh_token,
        expiry_date: token.expiry_date,
        token_type: token.token_type,
        id_token: token.id_token,
        scope: token.scope ?? undefined,
      };
    } catch (error) {
      this.logger.warn('Failed to load token file', {
        path: this.tokenPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  isValid(credentials: Auth.Credentials): boolean {
    if (!credentials.access_token) {
      return false;
    }
    const expiry = credentials.expiry_date;
    return expiry === undefined || expiry === null || expiry - EXPIRY_SKEW_MS > this.now();
  }

  /**
   * @throws {FormsAuthError} REFRESH_FAILED without a refresh token or when Google rejects it
   */
  async refresh(credentials: Auth.Credentials): Promise<Auth.Credentials> {
    if (!credentials.refresh_token) {
      throw new FormsAuthError(
        'Stored token has expired and has no refresh token',
        FormsAuthErrorCode.REFRESH_FAILED
      );
    }

    this.client.setCredentials(credentials);
    try {
      await this.client.getAccessToken();
    } catch (error) {
      throw new FormsAuthError(
        `Token refresh failed: ${error instanceof Error ? error.message : String(error)}`,
        FormsAuthErrorCode.REFRESH_FAILED,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    this.logger.info('Token refresh successful');
    // The client keeps the refresh token when Google does not return a new one
    return { ...this.client.credentials };
  }

  async persist(credentials: Auth.Credentials): Promise<void> {
    await writeFile(this.tokenPath, JSON.stringify(credentials, null, 2), 'utf-8');
    this.logger.info('Saved credentials', { path: this.tokenPath });
  }
}

/**
 * Runs the credential lifecycle: load, refresh when stale, persist the
 * refreshed value. A failed write is logged and does not fail the run.
 *
 * @throws {FormsAuthError} TOKEN_NOT_FOUND or REFRESH_FAILED
 */
export async function ensureValidCredentials<C>(
  store: CredentialStore<C>,
  logger: Logger,
  description: string
): Promise<C> {
  const loaded = await store.load();
  if (loaded === null) {
    throw new FormsAuthError(
      `Google token not found at ${description}. Provide a token file or mount the secret.`,
      FormsAuthErrorCode.TOKEN_NOT_FOUND
    );
  }

  if (store.isValid(loaded)) {
    logger.debug('Existing token is valid');
    return loaded;
  }

  logger.info('Token expired; attempting refresh');
  const refreshed = await store.refresh(loaded);

  try {
    await store.persist(refreshed);
  } catch (error) {
    logger.warn('Failed to save refreshed credentials', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return refreshed;
}

/**
 * Builds an authorized Google client for the configured auth method.
 *
 * @throws {FormsAuthError} When credentials are missing or cannot be refreshed
 */
export async function resolveGoogleAuth(
  config: AppConfig['forms'],
  logger: Logger = createLogger('forms')
): Promise<Auth.OAuth2Client> {
  if (config.authMethod === 'sa') {
    const keyFile = config.serviceAccountFile;
    if (!keyFile || !existsSync(keyFile)) {
      throw new FormsAuthError(
        `Service Account key file not found: ${keyFile ?? '(SA_FILE not set)'}`,
        FormsAuthErrorCode.SERVICE_ACCOUNT_NOT_FOUND
      );
    }
    logger.info('Authentication mode: service account', { keyFile });
    return new google.auth.JWT({ keyFile, scopes: [...FORMS_SCOPES] });
  }

  const secret = await loadClientSecret(config.clientSecretPath);
  const client = new google.auth.OAuth2(secret.clientId, secret.clientSecret, secret.redirectUri);
  const tokenPath = resolveTokenPath(config.tokenPath);
  const store = new FileTokenStore(tokenPath, client, { logger });

  logger.info('Authentication mode: OAuth (user)', { tokenPath });
  client.setCredentials(await ensureValidCredentials(store, logger, tokenPath));
  return client;
}
