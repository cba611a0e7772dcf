/**
 * Structured logging for the SDK.
 *
 * One line per record through the console: pretty text during development,
 * JSON when NODE_ENV is "production".
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  /**
   * Whether a record at this level would be written.
   */
  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  /**
   * Formats a record without writing it.
   */
  format(level: LogLevel, message: string, metadata?: LogMetadata, now: Date = new Date()): string {
    const timestamp = now.toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.isEnabled('debug')) return;
    console.debug(this.format('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.isEnabled('info')) return;
    console.info(this.format('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.isEnabled('warn')) return;
    console.warn(this.format('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.isEnabled('error')) return;
    console.error(this.format('error', message, metadata));
  }

  /**
   * Logger for a sub-module, sharing this logger's level and style.
   */
  child(module: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${module}` });
  }
}

/**
 * Reads the log level from EGERIA_LOG_LEVEL, then LOG_LEVEL. Defaults to info.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = (env.EGERIA_LOG_LEVEL ?? env.LOG_LEVEL)?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

/** Default logger instance */
export const logger = new Logger({
  level: getLogLevel(),
  service: 'egeria-sdk',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a logger for a module.
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
