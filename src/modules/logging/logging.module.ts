import { Global, Module } from '@nestjs/common';
import { LoggingService } from './logging.service';
import { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';
import { RequestLoggingInterceptor } from './interceptors/request-logging.interceptor';

/**
 * LoggingModule
 *
 * Global module providing structured Winston logging, correlation id
 * propagation and request logging.
 */
@Global()
@Module({
  providers: [LoggingService, CorrelationIdMiddleware, RequestLoggingInterceptor],
  exports: [LoggingService, CorrelationIdMiddleware, RequestLoggingInterceptor],
})
export class LoggingModule {}
