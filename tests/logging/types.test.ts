/**
 * Unit Tests for Logging Types
 */

import { describe, it, expect } from 'vitest';
import {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LoggerConfigSchema,
  createDefaultLoggerConfig,
  formatError,
  getLogLevelName,
  loadLoggerConfigFromEnv,
  parseLogLevel,
  shouldLog,
  verbosityToLogLevel,
} from '../../lib/src/logging/types.js';

describe('LogLevel', () => {
  it('should order levels by severity', () => {
    expect(LogLevel.ERROR).toBeLessThan(LogLevel.WARN);
    expect(LogLevel.WARN).toBeLessThan(LogLevel.INFO);
    expect(LogLevel.INFO).toBeLessThan(LogLevel.DEBUG);
    expect(LogLevel.DEBUG).toBeLessThan(LogLevel.TRACE);
  });

  it('should name every level', () => {
    expect(LogLevelName[LogLevel.WARN]).toBe('WARN');
    expect(getLogLevelName(LogLevel.TRACE)).toBe('TRACE');
  });

  it('should validate levels with LogLevelSchema', () => {
    expect(LogLevelSchema.safeParse(3).success).toBe(true);
    expect(LogLevelSchema.safeParse(5).success).toBe(false);
  });
});

describe('LoggerConfigSchema', () => {
  it('should apply defaults', () => {
    const config = createDefaultLoggerConfig();
    expect(config.level).toBe(LogLevel.INFO);
    expect(config.format).toBe('text');
    expect(config.timestamps).toBe(true);
    expect(config.console).toBe(true);
  });

  it('should reject unknown formats', () => {
    expect(LoggerConfigSchema.safeParse({ format: 'xml' }).success).toBe(false);
  });
});

describe('parseLogLevel', () => {
  it('should parse names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARN);
  });

  it('should fall back to INFO for unknown names', () => {
    expect(parseLogLevel('loud')).toBe(LogLevel.INFO);
  });
});

describe('verbosityToLogLevel', () => {
  it('should map 0-3 onto WARN..TRACE', () => {
    expect(verbosityToLogLevel(0)).toBe(LogLevel.WARN);
    expect(verbosityToLogLevel(1)).toBe(LogLevel.INFO);
    expect(verbosityToLogLevel(2)).toBe(LogLevel.DEBUG);
    expect(verbosityToLogLevel(3)).toBe(LogLevel.TRACE);
  });

  it('should clamp out-of-range values', () => {
    expect(verbosityToLogLevel(-2)).toBe(LogLevel.WARN);
    expect(verbosityToLogLevel(9)).toBe(LogLevel.TRACE);
    expect(verbosityToLogLevel(NaN)).toBe(LogLevel.WARN);
  });
});

describe('shouldLog', () => {
  it('should log levels at or above the minimum severity', () => {
    expect(shouldLog(LogLevel.ERROR, LogLevel.INFO)).toBe(true);
    expect(shouldLog(LogLevel.INFO, LogLevel.INFO)).toBe(true);
    expect(shouldLog(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
  });
});

describe('formatError', () => {
  it('should carry over a string code', () => {
    const error = Object.assign(new TypeError('bad type'), { code: 'E_TYPE' });
    expect(formatError(error)).toMatchObject({ name: 'TypeError', message: 'bad type', code: 'E_TYPE' });
  });

  it('should ignore a non-string code', () => {
    const error = Object.assign(new Error('numeric'), { code: 42 });
    expect(formatError(error).code).toBeUndefined();
  });

  it('should stringify non-Error values', () => {
    expect(formatError('oops')).toEqual({ name: 'UnknownError', message: 'oops' });
  });
});

describe('loadLoggerConfigFromEnv', () => {
  it('should prefer LOG_LEVEL over VERBOSITY', () => {
    expect(loadLoggerConfigFromEnv({ LOG_LEVEL: 'error', VERBOSITY: '3' })).toEqual({
      level: LogLevel.ERROR,
    });
  });

  it('should use VERBOSITY when LOG_LEVEL is unset', () => {
    expect(loadLoggerConfigFromEnv({ VERBOSITY: '2' })).toEqual({ level: LogLevel.DEBUG });
  });

  it('should read LOG_FORMAT', () => {
    expect(loadLoggerConfigFromEnv({ LOG_FORMAT: ' JSON ' })).toEqual({ format: 'json' });
  });

  it('should ignore an invalid LOG_FORMAT', () => {
    expect(loadLoggerConfigFromEnv({ LOG_FORMAT: 'yaml' })).toEqual({});
  });
});
