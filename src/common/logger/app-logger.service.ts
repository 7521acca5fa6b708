import { Injectable, LoggerService } from '@nestjs/common';
import { getRequestContext } from '../context/request-context';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'debug' | 'verbose' | 'info' | 'warn' | 'error' | 'fatal';

const LEVEL_RANK: Record<Level, number> = {
  debug: 10,
  verbose: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function resolveThreshold(raw: string | undefined): number {
  const value = raw?.trim().toLowerCase() ?? '';
  if (value === 'silent') return Number.POSITIVE_INFINITY;
  return isLevel(value) ? LEVEL_RANK[value] : LEVEL_RANK.debug;
}

const threshold = resolveThreshold(process.env.LOG_LEVEL);

/**
 * Structured JSON logger with request context support.
 * Every line carries the component name and, inside an HTTP request, its request ID.
 */
@Injectable()
export class AppLogger implements LoggerService {
  private context?: string;

  /**
   * Use in services: private readonly logger = AppLogger.create('ServiceName');
   */
  static create(context: string): AppLogger {
    const logger = new AppLogger();
    logger.context = context;
    return logger;
  }

  setContext(context: string) {
    this.context = context;
  }

  log(message: string, context?: LogContext | string): void {
    this.writeLog('info', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.writeLog('info', message, context);
  }

  error(message: string, context?: LogContext | string, trace?: string): void {
    const ctx = typeof context === 'string' ? { error: context } : context;
    this.writeLog('error', message, trace ? { ...ctx, trace } : ctx);
  }

  warn(message: string, context?: LogContext | string): void {
    this.writeLog('warn', message, context);
  }

  debug(message: string, context?: LogContext | string): void {
    this.writeLog('debug', message, context);
  }

  verbose(message: string, context?: LogContext | string): void {
    this.writeLog('verbose', message, context);
  }

  fatal(message: string, context?: LogContext | string): void {
    this.writeLog('fatal', message, context);
  }

  private writeLog(level: Level, message: string, context?: LogContext | string): void {
    if (LEVEL_RANK[level] < threshold) return;

    const requestCtx = getRequestContext();

    // Nest passes the component name as a plain string
    const contextData: LogContext =
      typeof context === 'string' ? { context } : context || {};

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      requestId: requestCtx?.requestId,
      ...contextData,
    };

    const output = JSON.stringify(
      Object.fromEntries(Object.entries(logEntry).filter(([, v]) => v !== undefined)),
    );

    switch (level) {
      case 'error':
      case 'fatal':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
      case 'verbose':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }
}
