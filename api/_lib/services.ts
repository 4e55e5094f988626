/**
 * Process-wide services for the API handlers, built lazily from the
 * environment on first use.
 */

import type { VercelResponse } from '@vercel/node';

import {
  type AppConfig,
  type Logger,
  type LoggerConfig,
  type MessagingClient,
  ActiveFormPointer,
  CompletionClient,
  GoogleFormsPublisher,
  PipelineOrchestrator,
  TwilioMessagingClient,
  createLogger,
  loadAppConfig,
  resolveGoogleAuth,
  validateAppEnv,
} from '../../lib/src/index.js';
import { createErrorResponse } from './http.js';

export interface Services {
  config: AppConfig;
  logger: Logger;
  orchestrator: Pick<PipelineOrchestrator, 'run'>;
  pointer: ActiveFormPointer;
  /** Null when the Twilio settings are incomplete */
  messaging: MessagingClient | null;
}

let services: Services | null = null;

/**
 * Get or create the services singleton
 *
 * @throws {z.ZodError} When the environment holds invalid settings
 */
export function getServices(): Services {
  if (!services) {
    services = createServices(loadAppConfig());
  }
  return services;
}

export function createServices(config: AppConfig): Services {
  const loggerConfig: Partial<LoggerConfig> = {};
  if (config.logging.level !== undefined) {
    loggerConfig.level = config.logging.level;
  }
  if (config.logging.format !== undefined) {
    loggerConfig.format = config.logging.format;
  }
  const logger = createLogger('api', loggerConfig);

  const validation = validateAppEnv();
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  for (const error of validation.errors) {
    logger.error(error);
  }

  const completionClient = new CompletionClient({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    timeoutMs: config.openai.timeoutMs,
    logger: logger.child('llm'),
  });

  const orchestrator = new PipelineOrchestrator({
    config,
    completionClient,
    createPublisher: async () => {
      const formsLogger = logger.child('forms');
      const auth = await resolveGoogleAuth(config.forms, formsLogger);
      return GoogleFormsPublisher.fromAuth(auth, formsLogger);
    },
    logger: logger.child('pipeline'),
  });

  return {
    config,
    logger,
    orchestrator,
    pointer: new ActiveFormPointer(config.activeFormPath, { logger: logger.child('pointer') }),
    messaging: config.twilio
      ? new TwilioMessagingClient(config.twilio, { logger: logger.child('messaging') })
      : null,
  };
}

/**
 * Like getServices, but answers 503 and returns null when the configuration
 * cannot be loaded.
 */
export function getServicesOrRespond(res: VercelResponse, requestId: string): Services | null {
  try {
    return getServices();
  } catch (error) {
    createLogger('api').error('Failed to load configuration', error, { requestId });
    createErrorResponse(res, 503, 'Service is not configured', 'CONFIGURATION_ERROR', { requestId });
    return null;
  }
}
