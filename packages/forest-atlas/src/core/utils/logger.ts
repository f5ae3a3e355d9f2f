/**
 * Structured logging utility for Forest Atlas
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: JSON lines in production (or when forced), a single readable
 * line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Write every level to stderr, leaving stdout to command output */
  readonly stderr?: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();

    if (this.config.pretty) {
      const metaStr =
        metadata && Object.keys(metadata).length > 0
          ? ` ${JSON.stringify(metadata)}`
          : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    const line = this.formatMessage('debug', message, metadata);
    if (this.config.stderr) console.error(line);
    else console.debug(line);
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    const line = this.formatMessage('info', message, metadata);
    if (this.config.stderr) console.error(line);
    else console.info(line);
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }

  /**
   * Logger for a sub-module, sharing level and format
   */
  child(module: string): Logger {
    return new Logger({
      ...this.config,
      service: `${this.config.service}:${module}`,
    });
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
};

export const logger = new Logger({
  level: getLogLevel(),
  service: 'forest-atlas',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a module logger with the default level and format
 */
export function createLogger(context: { readonly module: string }): Logger {
  return logger.child(context.module);
}

/**
 * Errors-only logger for tests
 */
export const silentLogger = new Logger({
  level: 'error',
  service: 'forest-atlas',
  pretty: true,
});
