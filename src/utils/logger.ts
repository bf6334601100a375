/**
 * Structured logging utility
 *
 * Provides consistent logging across the resolver with:
 * - Log levels (debug, info, warn, error)
 * - Structured context for debugging
 * - Silent mode for embedders that want no output
 * - Optional JSON output for log aggregation
 *
 * Configured from LOCALE_RESOLVER_LOG_LEVEL and LOCALE_RESOLVER_LOG_JSON.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

const LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;
type LevelName = (typeof LEVEL_NAMES)[number];

function isLevelName(value: string): value is LevelName {
  return (LEVEL_NAMES as readonly string[]).includes(value);
}

export class Logger {
  private static instance: Logger | null = null;
  private level: LogLevel = LogLevel.INFO;
  private jsonOutput = false;

  private constructor() {
    const envLevel = process.env.LOCALE_RESOLVER_LOG_LEVEL?.toUpperCase();
    if (envLevel && isLevelName(envLevel)) {
      this.level = LogLevel[envLevel];
    }

    this.jsonOutput = process.env.LOCALE_RESOLVER_LOG_JSON === 'true';
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public setJsonOutput(enabled: boolean): void {
    this.jsonOutput = enabled;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(entry: LogEntry): string {
    if (this.jsonOutput) {
      return JSON.stringify({
        ...entry,
        level: LogLevel[entry.level],
      });
    }

    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    return `[${LogLevel[entry.level]}] ${entry.message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const formatted = this.formatMessage({
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
    });

    switch (level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      default:
        console.debug(formatted);
    }
  }

  /**
   * Log debug message (only shown when LOCALE_RESOLVER_LOG_LEVEL=DEBUG)
   */
  public debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }
}

/**
 * Get the singleton logger instance
 */
export function getLogger(): Logger {
  return Logger.getInstance();
}

export const logger = Logger.getInstance();
