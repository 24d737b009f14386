import { createHash } from 'crypto';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SILENT = 'SILENT',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_ORDER.some(level => level === value);
}

/**
 * Resolve the level from LOG_LEVEL, falling back to INFO in production and
 * DEBUG everywhere else
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env.LOG_LEVEL?.toUpperCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return (env.NODE_ENV || 'development') === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export class Logger {
  private minLevel: LogLevel;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? resolveLogLevel();
    this.scope = options.scope;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Logger sharing this one's level with a nested scope (`bulk:smtp`)
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.minLevel,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private format(entry: LogEntry): string {
    const scope = entry.scope ? ` [${entry.scope}]` : '';
    const base = `[${entry.timestamp}] [${entry.level}]${scope} ${entry.message}`;

    if (entry.meta !== undefined) {
      const metaStr = typeof entry.meta === 'object'
        ? JSON.stringify(entry.meta, null, 2)
        : String(entry.meta);
      return `${base}\n${metaStr}`;
    }

    return base;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private entry(level: LogLevel, message: string, meta?: unknown): string {
    return this.format({ timestamp: new Date().toISOString(), level, scope: this.scope, message, meta });
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    console.log(this.entry(LogLevel.DEBUG, message, meta));
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    console.log(this.entry(LogLevel.INFO, message, meta));
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(this.entry(LogLevel.WARN, message, meta));
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    let meta: unknown = error;

    if (error instanceof Error) {
      meta = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    console.error(this.entry(LogLevel.ERROR, message, meta));
  }
}

/**
 * Hash email for privacy-safe logging (PII protection).
 * First 8 chars of SHA256 are enough for log correlation.
 */
export function hashEmailForLogging(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex').substring(0, 8);
}

export const logger = new Logger();
