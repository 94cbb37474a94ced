import { Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { CORRELATION_ID_HEADER } from '../constants';
import { RequestContextService } from '../services/request-context.service';

/**
 * Assigns each request a correlation id (reusing the caller's when present)
 * and runs the rest of the chain inside a request context.
 */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(private readonly requestContext: RequestContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.headers[CORRELATION_ID_HEADER];
    const correlationId =
      (Array.isArray(incoming) ? incoming[0] : incoming) || randomUUID();

    req.headers[CORRELATION_ID_HEADER] = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);

    this.requestContext.runWith({ correlationId }, () => next());
  }
}
