/**
 * Application Configuration
 *
 * One explicit configuration value, read from the environment once at process
 * start and passed to the orchestrator and the HTTP handlers. Nothing below
 * the handlers reads `process.env` directly.
 */

import { tmpdir } from 'node:os';
import { z } from 'zod';

import {
  type LogFormat,
  LogFormatSchema,
  LogLevelSchema,
  parseLogLevel,
  verbosityToLogLevel,
} from '../logging/index.js';
import { DEFAULT_COMPLETION_TIMEOUT_MS } from '../llm/completion-client.js';
import {
  DEFAULT_NUM_QUESTIONS,
  MAX_NUM_QUESTIONS,
  MIN_NUM_QUESTIONS,
  normalizeLanguage,
} from '../quiz/language.js';
import { QuizLanguageSchema } from '../quiz/types.js';

export const DEFAULT_MODEL = 'gpt-4.1';
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 60_000;

export const FormsAuthMethodSchema = z.enum(['oauth', 'sa']);
export type FormsAuthMethod = z.infer<typeof FormsAuthMethodSchema>;

/**
 * Application configuration schema
 */
export const AppConfigSchema = z.object({
  openai: z.object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    /** Per-attempt request timeout */
    timeoutMs: z.number().int().positive().default(DEFAULT_COMPLETION_TIMEOUT_MS),
  }),

  generation: z.object({
    model: z.string().min(1).default(DEFAULT_MODEL),
    numQuestions: z
      .number()
      .int()
      .min(MIN_NUM_QUESTIONS)
      .max(MAX_NUM_QUESTIONS)
      .default(DEFAULT_NUM_QUESTIONS),
    language: QuizLanguageSchema.default('en'),
    /**
     * Fewest questions accepted as a (partial) success. Zero questions are
     * always fatal regardless of this value.
     */
    minAcceptableQuestions: z.number().int().min(1).max(MAX_NUM_QUESTIONS).default(1),
  }),

  /** Root under which each run gets its own temp directory */
  workDir: z.string().min(1),

  forms: z.object({
    authMethod: FormsAuthMethodSchema.default('oauth'),
    tokenPath: z.string().min(1).optional(),
    clientSecretPath: z.string().min(1).default('client_secret.json'),
    serviceAccountFile: z.string().min(1).optional(),
    title: z.string().min(1).default('Mission Quiz'),
    documentTitle: z.string().min(1).default('MCQ Quiz'),
    /** Default recipient when a request does not name one */
    shareWith: z.string().email().optional(),
  }),

  activeFormPath: z.string().min(1).default('active_form.json'),
  adminToken: z.string().min(1).optional(),

  twilio: z
    .object({
      accountSid: z.string().min(1),
      authToken: z.string().min(1),
      from: z.string().min(1),
      downloadTimeoutMs: z.number().int().positive().default(DEFAULT_DOWNLOAD_TIMEOUT_MS),
    })
    .optional(),

  allowedOrigins: z.array(z.string().min(1)).default([]),

  logging: z.object({
    level: LogLevelSchema.optional(),
    format: LogFormatSchema.optional(),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Read an environment variable, stripping whitespace and wrapping quotes.
 * Empty values count as unset.
 */
function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim().replace(/^["']|["']$/g, '').trim();
  return value.length > 0 ? value : undefined;
}

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = readEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  const parsed = LogFormatSchema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

/**
 * Loads the application configuration from environment variables.
 *
 * Environment variables:
 * - OPENAI_API_KEY, OPENAI_BASE_URL, COMPLETION_TIMEOUT_MS
 * - MODEL (default gpt-4.1), NUM_QUESTIONS (default 6), LANGUAGE (en | he)
 * - MIN_ACCEPTABLE_QUESTIONS (default 1)
 * - WORK_DIR (default: OS temp dir)
 * - FORMS_AUTH_METHOD (oauth | sa), TOKEN_PATH, CLIENT_SECRET_PATH, SA_FILE
 * - FORM_TITLE, FORM_DOCUMENT_TITLE, SHARE_WITH
 * - ACTIVE_FORM_PATH, ADMIN_TOKEN
 * - TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_FROM
 * - ALLOWED_ORIGINS (comma-separated)
 * - LOG_LEVEL, VERBOSITY, LOG_FORMAT
 *
 * @throws {z.ZodError} If a provided value is invalid
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const accountSid = readEnv(env, 'TWILIO_ACCOUNT_SID');
  const authToken = readEnv(env, 'TWILIO_AUTH_TOKEN');
  const from = readEnv(env, 'TWILIO_FROM');

  const levelName = readEnv(env, 'LOG_LEVEL');
  const verbosity = readInt(env, 'VERBOSITY');

  const raw: AppConfigInput = {
    openai: {
      apiKey: readEnv(env, 'OPENAI_API_KEY'),
      baseUrl: readEnv(env, 'OPENAI_BASE_URL'),
      timeoutMs: readInt(env, 'COMPLETION_TIMEOUT_MS'),
    },
    generation: {
      model: readEnv(env, 'MODEL'),
      numQuestions: readInt(env, 'NUM_QUESTIONS'),
      language: normalizeLanguage(readEnv(env, 'LANGUAGE')),
      minAcceptableQuestions: readInt(env, 'MIN_ACCEPTABLE_QUESTIONS'),
    },
    workDir: readEnv(env, 'WORK_DIR') ?? tmpdir(),
    forms: {
      authMethod: readEnv(env, 'FORMS_AUTH_METHOD') === 'sa' ? 'sa' : 'oauth',
      tokenPath: readEnv(env, 'TOKEN_PATH'),
      clientSecretPath: readEnv(env, 'CLIENT_SECRET_PATH'),
      serviceAccountFile: readEnv(env, 'SA_FILE'),
      title: readEnv(env, 'FORM_TITLE'),
      documentTitle: readEnv(env, 'FORM_DOCUMENT_TITLE'),
      shareWith: readEnv(env, 'SHARE_WITH'),
    },
    activeFormPath: readEnv(env, 'ACTIVE_FORM_PATH'),
    adminToken: readEnv(env, 'ADMIN_TOKEN'),
    twilio:
      accountSid && authToken && from
        ? { accountSid, authToken, from }
        : undefined,
    allowedOrigins: (readEnv(env, 'ALLOWED_ORIGINS') ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    logging: {
      level:
        levelName !== undefined
          ? parseLogLevel(levelName)
          : verbosity !== undefined
            ? verbosityToLogLevel(verbosity)
            : undefined,
      format: parseLogFormat(readEnv(env, 'LOG_FORMAT')),
    },
  };

  return AppConfigSchema.parse(raw);
}

/**
 * Validates environment variables without throwing.
 * A missing OpenAI key is an error in production and a warning elsewhere.
 */
export function validateAppEnv(env: NodeJS.ProcessEnv = process.env): {
  isValid: boolean;
  warnings: string[];
  errors: string[];
} {
  const warnings: string[] = [];
  const errors: string[] = [];
  const isProduction = env['NODE_ENV'] === 'production';

  if (!readEnv(env, 'OPENAI_API_KEY')) {
    const message = 'OPENAI_API_KEY is not set; quiz generation will fail';
    if (isProduction) {
      errors.push(message);
    } else {
      warnings.push(message);
    }
  }

  const numQuestions = readEnv(env, 'NUM_QUESTIONS');
  if (numQuestions !== undefined) {
    const n = parseInt(numQuestions, 10);
    if (isNaN(n) || n < MIN_NUM_QUESTIONS || n > MAX_NUM_QUESTIONS) {
      errors.push(`NUM_QUESTIONS must be an integer between ${MIN_NUM_QUESTIONS} and ${MAX_NUM_QUESTIONS}`);
    }
  }

  const authMethod = readEnv(env, 'FORMS_AUTH_METHOD');
  if (authMethod !== undefined && !FormsAuthMethodSchema.safeParse(authMethod).success) {
    errors.push('FORMS_AUTH_METHOD must be "oauth" or "sa"');
  }
  if (authMethod === 'sa' && !readEnv(env, 'SA_FILE')) {
    errors.push('SA_FILE is required when FORMS_AUTH_METHOD is "sa"');
  }

  const twilioKeys = ['TWILIO_ACCOUNT_SID', 'TWILIO_AUTH_TOKEN', 'TWILIO_FROM'];
  const twilioSet = twilioKeys.filter((key) => readEnv(env, key) !== undefined);
  if (twilioSet.length > 0 && twilioSet.length < twilioKeys.length) {
    warnings.push(`Messaging is disabled: set all of ${twilioKeys.join(', ')}`);
  }

  if (!readEnv(env, 'ALLOWED_ORIGINS')) {
    warnings.push('ALLOWED_ORIGINS is not set; cross-origin requests will be rejected');
  }

  return {
    isValid: errors.length === 0,
    warnings,
    errors,
  };
}
