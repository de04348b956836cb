import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Request, Response } from 'express';
import { LoggingService } from '../logging.service';
import { getTraceId } from '../logging.context';

/**
 * RequestLoggingInterceptor
 *
 * Logs each request's outcome with method, path, status code, duration
 * and trace id. Health probes are skipped.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private static readonly SKIP_PATHS = ['/health'];

  constructor(private readonly loggingService: LoggingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const path = request.path || request.url;

    if (
      RequestLoggingInterceptor.SKIP_PATHS.some(
        (skip) => path === skip || path.startsWith(skip + '/'),
      )
    ) {
      return next.handle();
    }

    const method = request.method;
    const startTime = Date.now();
    const traceId = getTraceId();

    this.loggingService.log(`Incoming request ${method} ${path}`, 'RequestLoggingInterceptor');

    return next.handle().pipe(
      tap(() => {
        const response = httpContext.getResponse<Response>();
        this.loggingService.log(
          {
            message: `Request completed ${method} ${path}`,
            method,
            path,
            statusCode: response.statusCode,
            duration: Date.now() - startTime,
            traceId,
          },
          'RequestLoggingInterceptor',
        );
      }),
      catchError((error: unknown) => {
        this.loggingService.error(
          {
            message: `Request failed ${method} ${path}`,
            method,
            path,
            statusCode: error instanceof HttpException ? error.getStatus() : 500,
            duration: Date.now() - startTime,
            traceId,
            error: error instanceof Error ? error.message : 'Unknown error',
          },
          error instanceof Error ? error.stack : undefined,
          'RequestLoggingInterceptor',
        );

        return throwError(() => error);
      }),
    );
  }
}
