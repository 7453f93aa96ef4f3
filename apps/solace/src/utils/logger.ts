/**
 * Solace logger
 *
 * Loggers form a tree: `child` extends the dotted context and may bind
 * fields (a session id, a tier) that every entry below it carries. Entries
 * go to the console either as one JSON object per line or, in development,
 * as a single readable line with `key=value` pairs.
 */

import { CONFIG } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export type LogFields = Record<string, unknown>;

interface LoggedError {
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: string;
  data?: LogFields;
  error?: LoggedError;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Fields attached to every entry */
  fields?: LogFields;
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.INFO]: (line) => console.info(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

function describeError(error: unknown): LoggedError {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { message: error.message, code, stack: error.stack };
}

// Bare words stay bare; anything with spaces, quotes or `=` is JSON-quoted
function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value === null || typeof value !== 'object') {
    return String(value);
  }
  return JSON.stringify(value);
}

export class Logger {
  private level: LogLevel;
  private readonly pretty: boolean;
  private readonly fields: LogFields;

  constructor(
    readonly context?: string,
    options: LoggerOptions = {}
  ) {
    this.level = options.level ?? LEVEL_NAMES[CONFIG.logging.level] ?? LogLevel.INFO;
    this.pretty = options.pretty ?? CONFIG.logging.pretty;
    this.fields = options.fields ?? {};
  }

  /**
   * Logger for a sub-component, inheriting level, format and bound fields
   */
  child(context: string, fields: LogFields = {}): Logger {
    return new Logger(this.context ? `${this.context}:${context}` : context, {
      level: this.level,
      pretty: this.pretty,
      fields: { ...this.fields, ...fields },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(message: string, data?: object): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: object): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: object): void {
    this.write(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: object): void {
    this.write(LogLevel.ERROR, message, data, error === undefined ? undefined : describeError(error));
  }

  private write(level: LogLevel, message: string, data?: object, error?: LoggedError): void {
    if (!this.isLevelEnabled(level)) return;

    const merged: LogFields = { ...this.fields, ...data };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: this.context,
      data: Object.keys(merged).length > 0 ? merged : undefined,
      error,
    };

    SINKS[level](this.pretty ? this.toLine(entry) : JSON.stringify(entry));
  }

  private toLine(entry: LogEntry): string {
    let line = `${entry.timestamp} ${entry.level.padEnd(5)}`;
    if (entry.context) line += ` [${entry.context}]`;
    line += ` ${entry.message}`;

    for (const [key, value] of Object.entries(entry.data ?? {})) {
      if (value !== undefined) line += ` ${key}=${formatValue(value)}`;
    }

    if (entry.error) {
      line += `\n  error: ${entry.error.message}`;
      if (entry.error.code) line += ` (${entry.error.code})`;
      if (entry.error.stack) line += `\n${entry.error.stack}`;
    }
    return line;
  }
}

export const logger = new Logger('Solace');

export const createLogger = (context: string, fields?: LogFields): Logger => logger.child(context, fields);

export default logger;
