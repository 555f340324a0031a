import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  data?: LogContext;
  stack?: string;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const parseLevel = (value: string | undefined): LogLevel => {
  const match = LEVEL_ORDER.find((level) => level === value?.trim().toLowerCase());
  return match ?? LogLevel.INFO;
};

/**
 * Structured logger installed as the Nest application logger.
 *
 * Nest's `Logger` instances call `log(message, context)`; direct callers may
 * pass a data object instead. Production output is one JSON object per line.
 */
@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly level: LogLevel;
  private readonly isProduction: boolean;

  constructor(private readonly config: ConfigService) {
    this.level = parseLevel(this.config.get<string>('LOG_LEVEL'));
    this.isProduction = this.config.get<string>('NODE_ENV') === 'production';
  }

  debug(message: unknown, ...params: unknown[]): void {
    this.writeLog(LogLevel.DEBUG, message, params);
  }

  verbose(message: unknown, ...params: unknown[]): void {
    this.writeLog(LogLevel.DEBUG, message, params);
  }

  log(message: unknown, ...params: unknown[]): void {
    this.writeLog(LogLevel.INFO, message, params);
  }

  warn(message: unknown, ...params: unknown[]): void {
    this.writeLog(LogLevel.WARN, message, params);
  }

  error(message: unknown, ...params: unknown[]): void {
    this.writeLog(LogLevel.ERROR, message, params);
  }

  private writeLog(level: LogLevel, message: unknown, params: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry = this.buildEntry(level, message, params);
    if (this.isProduction) {
      process.stdout.write(`${JSON.stringify(entry)}\n`);
    } else {
      this.prettyPrint(entry);
    }
  }

  private buildEntry(level: LogLevel, message: unknown, params: unknown[]): LogEntry {
    let context: string | undefined;
    let data: LogContext | undefined;
    let stack: string | undefined;

    for (const param of params) {
      if (param instanceof Error) {
        data = { ...data, name: param.name, message: param.message };
        stack = param.stack;
      } else if (typeof param === 'string') {
        // Nest passes the context last; an error stack arrives before it.
        if (param.includes('\n    at ')) {
          stack = param;
        } else {
          context = param;
        }
      } else if (param && typeof param === 'object') {
        data = { ...data, ...Object.fromEntries(Object.entries(param)) };
      }
    }

    return {
      level,
      message: message instanceof Error ? message.message : String(message),
      timestamp: new Date().toISOString(),
      ...(context && { context }),
      ...(data && { data }),
      ...(stack && { stack }),
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private prettyPrint(entry: LogEntry): void {
    const prefix = [
      this.colorizeLevel(entry.level),
      entry.timestamp,
      entry.context && `[${entry.context}]`,
    ]
      .filter(Boolean)
      .join(' ');

    // eslint-disable-next-line no-console
    console.log(prefix, entry.message);
    if (entry.data && Object.keys(entry.data).length > 0) {
      // eslint-disable-next-line no-console
      console.log('  ', JSON.stringify(entry.data, null, 2));
    }
    if (entry.stack) {
      // eslint-disable-next-line no-console
      console.log(entry.stack);
    }
  }

  private colorizeLevel(level: LogLevel): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
    };
    return `${colors[level]}${level.toUpperCase()}\x1b[0m`;
  }
}
