import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AppError } from './AppError';
import { StoreError } from './StoreError';
import { UnprocessableEntityError } from './RequestErrors';

/** Error body returned by every endpoint. */
export interface ApiEvent {
  createdAt: string;
  logLevel: 'WARN' | 'ERROR';
  code: number;
  message: string;
  uri?: string;
  problems?: ReadonlyArray<string>;
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('ApiExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();

    const body = toApiEvent(exception, req.originalUrl);
    if (body.code >= 500) {
      const detail =
        exception instanceof StoreError
          ? exception.summary()
          : exception instanceof Error
            ? exception.stack
            : String(exception);
      this.logger.error(`${req.method} ${body.uri ?? ''}: ${body.message}`, detail);
    }

    // Client is gone; nothing left to answer.
    if (res.headersSent || res.destroyed) return;
    res.status(body.code).json(body);
  }
}

export function toApiEvent(exception: unknown, uri?: string): ApiEvent {
  const createdAt = new Date().toISOString();
  if (exception instanceof AppError) {
    const problems =
      exception instanceof UnprocessableEntityError
        ? exception.problems
        : undefined;
    return {
      createdAt,
      logLevel: exception.status >= 500 ? 'ERROR' : 'WARN',
      code: exception.status,
      message: exception.message,
      uri,
      problems,
    };
  }
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    return {
      createdAt,
      logLevel: status >= 500 ? 'ERROR' : 'WARN',
      code: status,
      message: httpExceptionMessage(exception),
      uri,
    };
  }
  return {
    createdAt,
    logLevel: 'ERROR',
    code: HttpStatus.INTERNAL_SERVER_ERROR,
    message: exception instanceof Error ? exception.message : 'internal error',
    uri,
  };
}

/** ValidationPipe puts a list of messages in the response body. */
function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  const message = 'message' in response ? response.message : undefined;
  if (Array.isArray(message)) return message.map(String).join('; ');
  if (typeof message === 'string') return message;
  return exception.message;
}
