import { Inject, Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import pino from 'pino';
import { TAX_CONFIG, TaxConfiguration } from '../config/config.schema';

export type Logger = pino.Logger;

type Level = 'info' | 'error' | 'warn' | 'debug' | 'trace';

/**
 * pino-backed logger for Nest and for services that want a category logger.
 * JSON lines on stderr, leaving stdout to CLI output; silent under NODE_ENV=test.
 */
@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly loggerCache = new Map<string, Logger>();
  private readonly rootLogger: Logger;

  constructor(@Inject(TAX_CONFIG) config: TaxConfiguration) {
    this.rootLogger = pino(
      {
        base: { service: 'capital-gains-replay', environment: config.nodeEnv },
        level: config.nodeEnv === 'test' ? 'silent' : config.logLevel,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2),
    );
  }

  log(message: unknown, context?: string) {
    this.write('info', message, context);
  }

  error(message: unknown, trace?: string, context?: string) {
    this.write('error', message, context, { trace });
  }

  warn(message: unknown, context?: string) {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string) {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string) {
    this.write('trace', message, context);
  }

  /** Child logger tagged with `category`, cached per category. */
  getLogger(category: string): Logger {
    const cached = this.loggerCache.get(category);
    if (cached) {
      return cached;
    }
    const categoryLogger = this.rootLogger.child({ category });
    this.loggerCache.set(category, categoryLogger);
    return categoryLogger;
  }

  private write(level: Level, message: unknown, context?: string, extra?: Record<string, unknown>) {
    const logger = this.getLogger(context ?? 'Application');
    if (typeof message === 'object' && message !== null) {
      logger[level]({ ...message, ...extra });
    } else {
      logger[level]({ ...extra }, String(message));
    }
  }
}
