import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Request, Response } from 'express';

function readField(body: object, field: string): unknown {
  return field in body ? Reflect.get(body, field) : undefined;
}

/** Errors raised by express middleware such as body-parser carry their own 4xx status. */
function isClientHttpError(
  exception: unknown,
): exception is Error & { statusCode: number } {
  if (!(exception instanceof Error) || !('statusCode' in exception)) return false;
  const { statusCode } = exception;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // A proxied response may already be streaming; all we can do is cut it off.
    if (response.headersSent) {
      this.logger.error(
        `${request.method} ${request.url} - failed after response started`,
        exception instanceof Error ? exception.stack : String(exception),
      );
      response.destroy();
      return;
    }

    let status: number;
    let message: unknown;
    let error: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const errorResponse = exception.getResponse();

      if (typeof errorResponse === 'object' && errorResponse !== null) {
        const errorField = readField(errorResponse, 'error');
        message = readField(errorResponse, 'message') || exception.message;
        error = typeof errorField === 'string' ? errorField : 'Http Exception';
      } else {
        message = String(errorResponse);
        error = 'Http Exception';
      }
    } else if (isClientHttpError(exception)) {
      status = exception.statusCode;
      message = exception.message;
      error = 'Http Exception';
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'An unexpected error occurred';
      error = 'Internal Server Error';
    }

    const errorResponse = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      error,
      message,
      ...(process.env.NODE_ENV === 'development' && {
        stack: exception instanceof Error ? exception.stack : undefined,
      }),
    };

    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${exception instanceof Error ? exception.message : String(message)}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${String(message)}`);
    }

    if (exception instanceof UnauthorizedException) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }
    response.status(status).json(errorResponse);
  }
}
