/**
 * Logger Implementation
 *
 * Structured logger used by every pipeline stage. Child loggers extend the
 * source path (`pipeline:completion`) and can bind context such as a run id.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  loadLoggerConfigFromEnv,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

type Context = Record<string, unknown>;

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger whose source is nested under this one.
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  /**
   * Create a logger that attaches `context` to every entry.
   */
  withContext(context: Context): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  error(message: string, context?: Context): void;
  error(message: string, error: unknown, context?: Context): void;
  error(message: string, errorOrContext?: unknown, context?: Context): void {
    if (context === undefined && isContext(errorOrContext)) {
      this.log(LogLevelEnum.ERROR, message, errorOrContext);
      return;
    }
    this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
  }

  warn(message: string, context?: Context): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Context): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Context): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Context): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Context,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const merged =
      this.config.context || context
        ? { ...this.config.context, ...context }
        : undefined;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: merged,
      source: this.config.source,
      error: error !== undefined ? formatError(error) : undefined,
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          message: entry.message,
          source: entry.source,
          context: entry.context,
          error: entry.error,
        });
      case LogFormat.COMPACT: {
        const time = entry.timestamp.toISOString().slice(11, 19);
        return `${time} ${LogLevelName[entry.level].charAt(0)} ${entry.message}`;
      }
      case LogFormat.PRETTY:
        return this.config.colors ? this.formatPretty(entry) : this.formatText(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(LogLevelName[entry.level].padEnd(5));
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];
    const color = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(`${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`);
    }
    parts.push(`${color}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);
    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }
    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
      return;
    }

    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else if (level === LogLevelEnum.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }
}

function isContext(value: unknown): value is Context {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error)
  );
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

/**
 * Get or create the process-wide logger, configured from LOG_LEVEL,
 * VERBOSITY and LOG_FORMAT on first use.
 */
export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      format: 'pretty',
      ...loadLoggerConfigFromEnv(),
    });
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Create a child of the global logger for a module or stage.
 */
export function createLogger(source: string, config?: Partial<LoggerConfig>): Logger {
  if (config) {
    return new Logger({ ...getGlobalLogger().getConfig(), ...config, source });
  }
  return getGlobalLogger().child(source);
}
