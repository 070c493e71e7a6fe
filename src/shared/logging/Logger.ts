import chalk from 'chalk';
import { isErrorLike } from '../errors/AppError';

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  fatal(message: string, error?: unknown, meta?: LogMeta): void;
  setLevel(level: LogLevel | string): void;
}

/**
 * Structured data attached to a log line
 */
export type LogMeta = Record<string, unknown>;

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  name: string;
  timestamp: boolean;
  colorize: boolean;
  json: boolean;
  prettyPrint: boolean;
}

/**
 * Settings a logger shares with its children
 */
export type LoggerSettings = Omit<LoggerConfig, 'name'>;

/**
 * Log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  logger: string;
  message: string;
  meta?: LogMeta;
  error?: Error;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.cyan,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.FATAL]: chalk.magenta,
  [LogLevel.SILENT]: (text: string) => text
};

/**
 * Parse a level name ('debug', 'INFO', ...) into a LogLevel
 */
export function parseLogLevel(level: string): LogLevel | undefined {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

const FALSE_VALUES = ['0', 'false', 'no', 'off'];

/**
 * Logger settings from LOG_LEVEL, LOG_FORMAT (pretty, plain or json) and LOG_TIMESTAMP
 */
export function loggerConfigFromEnv(env: NodeJS.ProcessEnv): Partial<LoggerConfig> {
  const config: Partial<LoggerConfig> = {};

  const level = parseLogLevel(env.LOG_LEVEL ?? '');
  if (level !== undefined) {
    config.level = level;
  }

  switch ((env.LOG_FORMAT ?? '').trim().toLowerCase()) {
    case 'json':
      config.json = true;
      break;
    case 'plain':
      config.colorize = false;
      config.prettyPrint = false;
      break;
    default:
      break;
  }

  if (env.LOG_TIMESTAMP !== undefined && env.LOG_TIMESTAMP.trim() !== '') {
    config.timestamp = !FALSE_VALUES.includes(env.LOG_TIMESTAMP.trim().toLowerCase());
  }

  return config;
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements ILogger {
  readonly name: string;
  private readonly config: LoggerSettings;

  constructor(config: Partial<LoggerConfig> = {}, shared?: LoggerSettings) {
    const { name = 'App', ...settings } = config;
    this.name = name;
    this.config = shared ?? {
      level: LogLevel.INFO,
      timestamp: true,
      colorize: true,
      json: false,
      prettyPrint: true,
      ...settings
    };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta, error);
  }

  fatal(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.FATAL, message, meta, error);
  }

  setLevel(level: LogLevel | string): void {
    if (typeof level === 'string') {
      const levelValue = parseLogLevel(level);
      if (levelValue !== undefined) {
        this.config.level = levelValue;
      }
    } else {
      this.config.level = level;
    }
  }

  /**
   * Logger sharing this logger's settings (level included) under a dotted name
   */
  child(name: string): ConsoleLogger {
    return new ConsoleLogger({ name: `${this.name}.${name}` }, this.config);
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: unknown): void {
    if (level < this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      meta,
      error: error === undefined ? undefined : toError(error)
    };

    if (this.config.json) {
      this.logJson(entry);
    } else {
      this.logPretty(entry);
    }
  }

  /**
   * Log in JSON format
   */
  private logJson(entry: LogEntry): void {
    const output = {
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      logger: entry.logger,
      message: entry.message,
      ...(entry.meta && { meta: entry.meta }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack
        }
      })
    };

    console.log(JSON.stringify(output));
  }

  /**
   * Log in pretty format
   */
  private logPretty(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.config.timestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(this.getLevelString(entry.level));
    parts.push(`[${entry.logger}]`);
    parts.push(entry.message);

    const logMethod = this.getConsoleMethod(entry.level);
    logMethod(parts.join(' '));

    if (entry.meta && this.config.prettyPrint) {
      console.log('  Meta:', entry.meta);
    }

    if (entry.error) {
      console.error('  Error:', entry.error.message);
      if (entry.error.stack && this.config.level === LogLevel.DEBUG) {
        console.error('  Stack:', entry.error.stack);
      }
    }
  }

  /**
   * Get level string with color
   */
  private getLevelString(level: LogLevel): string {
    const label = `[${LogLevel[level]}]`;
    return this.config.colorize ? LEVEL_COLORS[level](label) : label;
  }

  /**
   * Get console method for level
   */
  private getConsoleMethod(level: LogLevel): (message: string) => void {
    switch (level) {
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        return console.error;
      default:
        return console.log;
    }
  }
}

function toError(error: unknown): Error {
  return isErrorLike(error) ? error : new Error(String(error));
}

/**
 * Create a logger
 */
export function createLogger(name: string, config: Partial<LoggerConfig> = {}): ConsoleLogger {
  return new ConsoleLogger({ ...config, name });
}

/**
 * Create child logger
 */
export function createChildLogger(parent: ILogger, name: string): ILogger {
  if (parent instanceof ConsoleLogger) {
    return parent.child(name);
  }
  return parent;
}
