/**
 * Structured logging utility for the energy pipeline
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: JSON lines in production, one readable line per entry otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
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

/**
 * Settings shared by the root logger and every child created from it,
 * so that `configureLogging()` from the CLI reaches module loggers too.
 */
interface SharedSettings {
  level: LogLevel;
  pretty: boolean;
}

export class Logger {
  constructor(
    private readonly service: string,
    private readonly settings: SharedSettings
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.settings.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.settings.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
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
   * Create a child logger scoped to a module
   */
  child(module: string): Logger {
    return new Logger(`${this.service}:${module}`, this.settings);
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
};

const settings: SharedSettings = {
  level: getLogLevel(),
  pretty: process.env.NODE_ENV !== 'production',
};

export const logger = new Logger('energy-pipeline', settings);

/**
 * Create a child logger with additional context
 */
export function createLogger(context: { readonly module: string }): Logger {
  return logger.child(context.module);
}

/**
 * Apply level and output format from loaded configuration.
 */
export function configureLogging(options: { readonly level?: LogLevel; readonly json?: boolean }): void {
  if (options.level !== undefined) {
    settings.level = options.level;
  }
  if (options.json !== undefined) {
    settings.pretty = !options.json;
  }
}
