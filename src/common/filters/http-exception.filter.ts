import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

export interface ErrorResponseBody {
  statusCode: number;
  error_message: string;
  details?: string[];
  path: string;
  timestamp: string;
}

/**
 * Single error shape for every failed request.
 *
 * HttpExceptions keep their status and message; anything else (a store
 * failure, a bug) becomes a 500 whose cause is only logged.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = this.buildErrorResponse(exception, request.url);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} -> ${body.statusCode}: ${body.error_message}`,
      );
    }

    response.status(body.statusCode).json(body);
  }

  private buildErrorResponse(
    exception: unknown,
    path: string,
  ): ErrorResponseBody {
    const timestamp = new Date().toISOString();

    if (!(exception instanceof HttpException)) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error_message: 'Internal server error.',
        path,
        timestamp,
      };
    }

    const payload = exception.getResponse();
    const details = this.extractDetails(payload);

    return {
      statusCode: exception.getStatus(),
      error_message: this.extractMessage(payload, exception.message),
      ...(details ? { details } : {}),
      path,
      timestamp,
    };
  }

  private extractMessage(payload: string | object, fallback: string): string {
    if (typeof payload === 'string') return payload;

    if ('message' in payload) {
      const { message } = payload;
      if (typeof message === 'string') return message;
      // Default ValidationPipe style: message is a list of constraint messages
      if (Array.isArray(message)) {
        return message.filter((m) => typeof m === 'string').join('; ');
      }
    }

    return fallback;
  }

  private extractDetails(payload: string | object): string[] | undefined {
    if (typeof payload === 'string' || !('details' in payload)) {
      return undefined;
    }
    const { details } = payload;
    if (!Array.isArray(details)) return undefined;
    return details.filter((d): d is string => typeof d === 'string');
  }
}
