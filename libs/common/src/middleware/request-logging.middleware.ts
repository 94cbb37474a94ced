import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { CORRELATION_ID_HEADER } from '../constants';
import { AppLoggerService } from '../services/app-logger.service';

/** Logs method, path, status and latency once the response has been sent. */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  constructor(private readonly appLogger: AppLoggerService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();
    const { method, originalUrl } = req;
    const correlationId = req.headers[CORRELATION_ID_HEADER];

    res.on('finish', () => {
      this.appLogger.logResponse(
        method,
        originalUrl.split('?')[0],
        res.statusCode,
        Date.now() - startTime,
        {
          requestId: typeof correlationId === 'string' ? correlationId : undefined,
          ip: req.ip,
          userAgent: req.get('user-agent'),
        },
      );
    });

    next();
  }
}
