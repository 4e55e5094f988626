/**
 * Logging Types and Schemas
 *
 * Log levels, entry shape and logger configuration for the quiz pipeline.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Structured context merged from the logger's bound context and the call site */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Stage or module that emitted the entry, e.g. `pipeline:completion` */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  TEXT: 'text',
  JSON: 'json',
  COMPACT: 'compact',
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.default(LogLevel.INFO),
  format: LogFormatSchema.default('text'),
  timestamps: z.boolean().default(true),
  colors: z.boolean().default(true),
  source: z.string().optional(),
  /**
   * Context attached to every entry (run ids, request ids).
   * Call-site context wins on key collisions.
   */
  context: z.record(z.unknown()).optional(),
  console: z.boolean().default(true),
  /**
   * Custom sink. When set, console output is skipped.
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: Partial<LoggerConfig>
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Colors
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
  TRACE: LogLevel.TRACE,
};

/**
 * Parse a log level name. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  return LEVELS_BY_NAME[level.trim().toUpperCase()] ?? LogLevel.INFO;
}

/**
 * Map a numeric verbosity (0-3) onto a log level.
 *
 * 0 keeps warnings and errors, 1 adds info, 2 debug, 3 and above trace.
 */
export function verbosityToLogLevel(verbosity: number): LogLevel {
  if (!Number.isFinite(verbosity) || verbosity <= 0) {
    return LogLevel.WARN;
  }
  if (verbosity === 1) {
    return LogLevel.INFO;
  }
  if (verbosity === 2) {
    return LogLevel.DEBUG;
  }
  return LogLevel.TRACE;
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging. A string `code` property is carried over.
 */
export function formatError(
  error: unknown
): { name: string; message: string; code?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined && { code }),
      ...(error.stack !== undefined && { stack: error.stack }),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Build a logger configuration from environment variables.
 *
 * - LOG_LEVEL: level name (error, warn, info, debug, trace)
 * - VERBOSITY: 0-3, used when LOG_LEVEL is unset
 * - LOG_FORMAT: text | json | compact | pretty
 */
export function loadLoggerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<LoggerConfig> {
  const config: Partial<LoggerConfig> = {};

  const levelName = env['LOG_LEVEL'];
  const verbosity = env['VERBOSITY'];
  if (levelName) {
    config.level = parseLogLevel(levelName);
  } else if (verbosity) {
    config.level = verbosityToLogLevel(parseInt(verbosity, 10));
  }

  const format = LogFormatSchema.safeParse(env['LOG_FORMAT']?.trim().toLowerCase());
  if (format.success) {
    config.format = format.data;
  }

  return config;
}
