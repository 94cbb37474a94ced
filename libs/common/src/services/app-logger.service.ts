import { Inject, Injectable, Logger, LoggerService } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { loggingConfig } from '../config/logging.config';
import { RequestContextService } from './request-context.service';

export interface LogContext {
  subjectId?: string;
  requestId?: string;
  method?: string;
  url?: string;
  statusCode?: number;
  duration?: number;
  [key: string]: unknown;
}

const LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'];

@Injectable()
export class AppLoggerService implements LoggerService {
  private readonly logger = new Logger(AppLoggerService.name);
  private readonly logLevel: string;

  constructor(
    @Inject(loggingConfig.KEY)
    config: ConfigType<typeof loggingConfig>,
    private readonly requestContext: RequestContextService,
  ) {
    this.logLevel = config.level === 'info' ? 'log' : config.level;
  }

  log(message: unknown, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.log(message, context);
    } else {
      this.logger.log(this.formatMessage(String(message), context));
    }
  }

  error(message: unknown, trace?: string, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.error(message, trace, context);
    } else {
      this.logger.error(this.formatMessage(String(message), context), trace);
    }
  }

  warn(message: unknown, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.warn(message, context);
    } else {
      this.logger.warn(this.formatMessage(String(message), context));
    }
  }

  debug(message: unknown, context?: string | LogContext): void {
    if (!this.shouldLog('debug')) return;
    if (typeof context === 'string') {
      this.logger.debug(message, context);
    } else {
      this.logger.debug(this.formatMessage(String(message), context));
    }
  }

  verbose(message: unknown, context?: string | LogContext): void {
    if (!this.shouldLog('verbose')) return;
    if (typeof context === 'string') {
      this.logger.verbose(message, context);
    } else {
      this.logger.verbose(this.formatMessage(String(message), context));
    }
  }

  /**
   * Log HTTP response
   */
  logResponse(
    method: string,
    url: string,
    statusCode: number,
    duration: number,
    context?: LogContext,
  ): void {
    const message = `${method} ${url} - ${statusCode} - ${duration}ms`;
    const enriched: LogContext = {
      ...context,
      method,
      url,
      statusCode,
      duration,
      type: 'response',
    };

    if (statusCode >= 500) {
      this.error(message, undefined, enriched);
    } else if (statusCode >= 400) {
      this.warn(message, enriched);
    } else {
      this.log(message, enriched);
    }
  }

  /**
   * Log security event. Never pass tokens, passwords or hashes in `context`.
   */
  logSecurity(event: string, context?: LogContext): void {
    this.warn(`SECURITY: ${event}`, {
      ...context,
      type: 'security',
    });
  }

  private formatMessage(message: string, context?: LogContext): string {
    if (!context) return message;

    const enrich: LogContext = {
      ...context,
      requestId: context.requestId ?? this.requestContext.get('correlationId'),
    };

    const contextStr = Object.entries(enrich)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');

    return `${message} | ${contextStr}`;
  }

  private shouldLog(level: string): boolean {
    const currentLevelIndex = LEVELS.indexOf(this.logLevel);
    const requestedLevelIndex = LEVELS.indexOf(level);

    return requestedLevelIndex <= currentLevelIndex;
  }
}
