import chalk from 'chalk';
import { match } from 'ts-pattern';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormat = 'json' | 'text';

export type LoggerOptions = {
  format?: LogFormat;
  level?: LogLevel;
  metadata?: Record<string, unknown>;
  silent?: boolean;
  timestamp?: boolean;
  verbose?: boolean;
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  metadata?: Record<string, unknown>;
  timestamp: string;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 999,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Leveled logger for the CLI.
 *
 * Log lines go to stderr so that stdout only carries command results
 * (see {@link Logger.raw}).
 */
class Logger {
  private _options: Required<LoggerOptions>;

  constructor(options: LoggerOptions = {}) {
    this._options = this._resolve({
      level: this._getLogLevelFromEnv(options.level),
      format: this._getFormatFromEnv(options.format),
      verbose: options.verbose ?? isTruthyFlag(process.env.VERBOSE),
      silent: options.silent ?? isTruthyFlag(process.env.SILENT),
      timestamp: options.timestamp ?? false,
      metadata: options.metadata ?? {},
    });
  }

  private _getLogLevelFromEnv(defaultLevel?: LogLevel): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLevel)) {
      return envLevel;
    }
    return defaultLevel ?? 'info';
  }

  private _getFormatFromEnv(defaultFormat?: LogFormat): LogFormat {
    const envFormat = process.env.LOG_FORMAT?.toLowerCase();
    if (envFormat === 'json' || envFormat === 'text') {
      return envFormat;
    }
    return defaultFormat ?? 'text';
  }

  // Silent wins over verbose, verbose forces debug
  private _resolve(options: Required<LoggerOptions>): Required<LoggerOptions> {
    if (options.silent) {
      return { ...options, level: 'silent' };
    }
    if (options.verbose) {
      return { ...options, level: 'debug' };
    }
    return options;
  }

  private _shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this._options.level];
  }

  private _serialize(metadata: Record<string, unknown>): Record<string, unknown> {
    const serialized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      serialized[key] =
        value instanceof Error
          ? {
              name: value.name,
              message: value.message,
              ...(this._options.level === 'debug' && { stack: value.stack }),
            }
          : value;
    }
    return serialized;
  }

  private _formatMessage(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
  ): string {
    if (this._options.format === 'json') {
      const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        metadata: this._serialize({ ...this._options.metadata, ...metadata }),
      };
      return JSON.stringify(entry);
    }

    const timestamp = this._options.timestamp ? `[${new Date().toISOString()}] ` : '';
    const levelPrefix = match(level)
      .with('debug', () => chalk.gray('[DEBUG]'))
      .with('info', () => chalk.blue('[INFO]'))
      .with('warn', () => chalk.yellow('[WARN]'))
      .with('error', () => chalk.red('[ERROR]'))
      .with('silent', () => '')
      .exhaustive();

    const merged = { ...this._options.metadata, ...metadata };
    const metadataString =
      Object.keys(merged).length > 0 ? chalk.gray(` ${JSON.stringify(this._serialize(merged))}`) : '';

    return `${timestamp}${levelPrefix} ${message}${metadataString}`;
  }

  private _write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (this._shouldLog(level)) {
      console.error(this._formatMessage(level, message, metadata));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this._write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this._write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this._write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this._write('error', message, metadata);
  }

  /**
   * Write a result line to stdout, bypassing level prefixes.
   * Results are printed at every level, including silent.
   */
  raw(message: string): void {
    console.log(message);
  }

  configure(options: Partial<LoggerOptions>): void {
    this._options = this._resolve({ ...this._options, ...options });
  }

  child(metadata: Record<string, unknown>): Logger {
    return new Logger({
      ...this._options,
      metadata: { ...this._options.metadata, ...metadata },
    });
  }

  getOptions(): Readonly<Required<LoggerOptions>> {
    return { ...this._options };
  }
}

export const logger = new Logger();

export { Logger };
