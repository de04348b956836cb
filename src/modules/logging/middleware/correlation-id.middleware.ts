import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { loggingContext } from '../logging.context';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * CorrelationIdMiddleware
 *
 * Generates or propagates a correlation id for every incoming request and
 * stores it in AsyncLocalStorage for the rest of the request.
 *
 * Header precedence: x-trace-id, then x-correlation-id, then a new UUID v4.
 * The id is always echoed back as the x-trace-id response header.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const traceId =
      headerValue(req.headers['x-trace-id']) ||
      headerValue(req.headers['x-correlation-id']) ||
      uuidv4();

    res.setHeader('x-trace-id', traceId);

    loggingContext.run({ traceId }, () => {
      next();
    });
  }
}
