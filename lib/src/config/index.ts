/**
 * Configuration Module
 */

export {
  AppConfigSchema,
  type AppConfig,
  type AppConfigInput,
  FormsAuthMethodSchema,
  type FormsAuthMethod,
  loadAppConfig,
  validateAppEnv,
  DEFAULT_MODEL,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
} from './app-config.js';
