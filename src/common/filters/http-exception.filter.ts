import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

/**
 * Standardized error response format. Extra fields carried by the
 * exception body (such as conversation_id) are passed through.
 */
interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  [extra: string]: unknown;
}

const RESERVED_FIELDS = new Set(['statusCode', 'message', 'error', 'timestamp', 'path']);

function describeMessage(body: object): string {
  const message = 'message' in body ? body.message : undefined;
  if (Array.isArray(message)) {
    return message.join(', ');
  }
  if (typeof message === 'string') {
    return message;
  }
  const error = 'error' in body ? body.error : undefined;
  return typeof error === 'string' ? error : 'An error occurred';
}

/**
 * Global HTTP exception filter to standardize error responses
 */
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    let message: string;
    const extras: Record<string, unknown> = {};
    if (typeof exceptionResponse === 'string') {
      message = exceptionResponse;
    } else {
      message = describeMessage(exceptionResponse);
      for (const [key, value] of Object.entries(exceptionResponse)) {
        if (!RESERVED_FIELDS.has(key)) {
          extras[key] = value;
        }
      }
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error: HttpStatus[status] || 'Error',
      timestamp: new Date().toISOString(),
      path: request.url,
      ...extras,
    };

    // 4xx client errors are not logged, except 401/403
    if (status >= 500 || status === 401 || status === 403) {
      this.logger.error(
        `HTTP ${status} Error: ${message} | Path: ${request.url} | IP: ${request.ip}`,
        exception.stack,
      );
    }

    response.status(status).json(errorResponse);
  }
}
