import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { ExtractionFailure } from '../errors';

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  message: string;
  error?: string;
}

const DATABASE_ERROR_HINTS = ['timeout', 'ECONNREFUSED', 'ENOTFOUND', 'database'];

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toResponseBody(exception, request.url);
    const logMessage = `${request.method} ${request.url} - ${body.statusCode} - ${body.message}`;

    if (body.statusCode >= 500) {
      this.logger.error(logMessage, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(logMessage);
    }

    response.status(body.statusCode).json(body);
  }

  toResponseBody(exception: unknown, path: string): ErrorResponseBody {
    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else if (typeof exceptionResponse === 'object' && 'message' in exceptionResponse) {
        const responseMessage: unknown = exceptionResponse.message;
        message = Array.isArray(responseMessage)
          ? responseMessage.join(', ')
          : String(responseMessage);
        if ('error' in exceptionResponse && typeof exceptionResponse.error === 'string') {
          error = exceptionResponse.error;
        }
      }
    } else if (exception instanceof ExtractionFailure) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      message = exception.message;
      error = exception.name;
    } else if (exception instanceof Error) {
      message = exception.message;
      if (DATABASE_ERROR_HINTS.some((hint) => exception.message.includes(hint))) {
        status = HttpStatus.SERVICE_UNAVAILABLE;
        message = 'Database connection error. Please try again.';
      }
    }

    return {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path,
      message,
      ...(error && { error }),
    };
  }
}
