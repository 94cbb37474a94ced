import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AppLoggerService } from '../services/app-logger.service';
import { RateLimitService } from '../services/rate-limit.service';

@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(
    private readonly rateLimit: RateLimitService,
    private readonly appLogger: AppLoggerService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const clientKey = request.ip || request.socket.remoteAddress || 'unknown';

    const decision = await this.rateLimit.hit(clientKey);
    response.setHeader('X-RateLimit-Limit', String(decision.limit));
    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      response.setHeader(
        'Retry-After',
        String(Math.max(1, Math.ceil((decision.resetAtMs - Date.now()) / 1000))),
      );
      this.appLogger.logSecurity('Rate limit exceeded', {
        ip: clientKey,
        url: request.originalUrl,
      });
      throw new HttpException(
        {
          message: 'Rate limit exceeded. Please try again later.',
          error: 'Too Many Requests',
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
    return true;
  }
}
