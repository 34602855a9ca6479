/**
 * Structured Logger — JSON-formatted logging with levels, timestamps, and context
 *
 * - Machine-parseable JSON lines in production
 * - Human-readable lines in development
 * - Log levels (debug, info, warn, error), selected with ISSUANCE_LOG_LEVEL
 * - Bound context through child loggers (component, identity, block, ...)
 *
 * bigint values in log data are written as decimal strings.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

function bigintSafe(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class StructuredLogger {
  private minLevel: LogLevel;
  private defaultContext: LogData;
  private useJson: boolean;

  constructor(opts?: {
    minLevel?: LogLevel;
    context?: LogData;
    json?: boolean;
  }) {
    const fallback = process.env.NODE_ENV === 'test' ? 'warn' : 'info';
    const envLevel = (process.env.ISSUANCE_LOG_LEVEL || fallback).toLowerCase();
    this.minLevel = opts?.minLevel ?? LEVELS_BY_NAME[envLevel] ?? LogLevel.INFO;
    this.defaultContext = opts?.context ?? {};
    this.useJson = opts?.json ?? (process.env.NODE_ENV === 'production');
  }

  child(context: LogData): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      context: { ...this.defaultContext, ...context },
      json: this.useJson,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  private log(level: LogLevel, component: string, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      component,
      message,
      ...this.defaultContext,
      ...data,
    };

    if (this.useJson) {
      const output = JSON.stringify(entry, bigintSafe);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
      return;
    }

    const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
    const context = { ...this.defaultContext, ...data };
    const extra = Object.keys(context).length > 0 ? ' ' + JSON.stringify(context, bigintSafe) : '';
    const line = `${ts} ${lvl} [${component}] ${message}${extra}`;
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level >= LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Singleton logger instance
export const logger = new StructuredLogger();
