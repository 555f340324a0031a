import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { BaseAppError, ValidationError, type ValidationField } from '../errors';

interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  details?: Record<string, unknown>;
  fields?: ValidationField[];
}

const readMessage = (body: object, fallback: string): string => {
  const message = 'message' in body ? body.message : undefined;
  if (Array.isArray(message)) {
    return message.join(', ');
  }
  return typeof message === 'string' ? message : fallback;
};

/**
 * Global exception filter that converts all exceptions to a consistent JSON response format.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error = 'INTERNAL_SERVER_ERROR';
    let details: Record<string, unknown> | undefined;
    let fields: ValidationField[] | undefined;

    if (exception instanceof BaseAppError) {
      status = exception.statusCode;
      message = exception.message;
      error = exception.errorCode;
      details = exception.details;
      if (exception instanceof ValidationError) {
        fields = exception.fields;
      }
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const body = exception.getResponse();
      if (typeof body === 'string') {
        message = body;
      } else {
        message = readMessage(body, message);
        if ('error' in body && body.error) {
          error = String(body.error);
        }
      }
    }

    if (status >= 500) {
      const internalMessage = exception instanceof Error ? exception.message : 'Unknown';
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${internalMessage}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${message}`);
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(details && { details }),
      ...(fields && { fields }),
    };

    response.status(status).json(errorResponse);
  }
}
