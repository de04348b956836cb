import { LoggerService, Injectable } from '@nestjs/common';
import * as winston from 'winston';
import { getConversationId, getTraceId } from './logging.context';

/**
 * LoggingService
 *
 * NestJS LoggerService implementation backed by Winston.
 * Produces structured JSON logs with the service name, correlation id
 * and conversation id, and redacts sensitive fields.
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | debug | verbose (default: "info")
 * - LOG_FORMAT: "json" (default) | "pretty"
 * - LOG_SERVICE_NAME: service identifier (default: "vendor-bid-api")
 */

/** Fields that must be redacted from log output */
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'apiKey',
  'secret',
  'authorization',
  'api_key',
];

type LogMeta = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class LoggingService implements LoggerService {
  private readonly logger: winston.Logger;
  private readonly serviceName: string;

  constructor() {
    this.serviceName = process.env.LOG_SERVICE_NAME || 'vendor-bid-api';
    const level = this.mapLogLevel(process.env.LOG_LEVEL || 'info');
    const formatType = process.env.LOG_FORMAT || 'json';

    const formatters =
      formatType === 'pretty'
        ? winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
              const ctx = meta.context ? `[${String(meta.context)}]` : '';
              const conversation = meta.conversationId ? `{${String(meta.conversationId)}}` : '';
              const traceId = meta.traceId ? `(${String(meta.traceId)})` : '';
              return `${String(timestamp)} ${lvl} ${ctx} ${traceId}${conversation} ${String(message)}`;
            }),
          )
        : winston.format.combine(
            winston.format.timestamp(),
            winston.format.json(),
          );

    this.logger = winston.createLogger({
      level,
      defaultMeta: { service: this.serviceName },
      format: formatters,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * NestJS "verbose" is its most permissive level while winston's
   * "verbose" sits below "debug", so the two names swap.
   */
  private mapLogLevel(level: string): string {
    const mapping: Record<string, string> = {
      error: 'error',
      warn: 'warn',
      info: 'info',
      debug: 'verbose',
      verbose: 'debug',
    };
    return mapping[level] || 'info';
  }

  log(message: unknown, context?: string): void {
    this.logMessage('info', message, this.buildMeta(context));
  }

  error(message: unknown, trace?: string, context?: string): void {
    const meta = this.buildMeta(context);
    if (trace) {
      meta.error = trace;
    }
    this.logMessage('error', message, meta);
  }

  warn(message: unknown, context?: string): void {
    this.logMessage('warn', message, this.buildMeta(context));
  }

  debug(message: unknown, context?: string): void {
    this.logMessage('debug', message, this.buildMeta(context));
  }

  verbose(message: unknown, context?: string): void {
    this.logMessage('verbose', message, this.buildMeta(context));
  }

  /**
   * Object messages are flattened into top-level fields, with their
   * `message` property used as the log line.
   */
  private logMessage(level: string, message: unknown, meta: LogMeta): void {
    const sanitized = this.sanitize(message);
    if (isPlainObject(sanitized)) {
      const { message: msg, ...rest } = sanitized;
      Object.assign(meta, rest);
      this.logger.log(level, typeof msg === 'string' ? msg : '', meta);
    } else {
      this.logger.log(level, String(sanitized), meta);
    }
  }

  private buildMeta(context?: string): LogMeta {
    const meta: LogMeta = {};
    if (context) {
      meta.context = context;
    }
    const traceId = getTraceId();
    if (traceId) {
      meta.traceId = traceId;
    }
    const conversationId = getConversationId();
    if (conversationId) {
      meta.conversationId = conversationId;
    }
    return meta;
  }

  /**
   * Strip sensitive fields from a log message or object.
   */
  sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
      return String(data);
    }
    if (Array.isArray(data)) {
      return data.map((item) => this.sanitizeValue(item));
    }
    if (isPlainObject(data)) {
      return this.sanitizeObject(data);
    }
    return data;
  }

  private sanitizeValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitizeValue(item));
    }
    return isPlainObject(value) ? this.sanitizeObject(value) : value;
  }

  private sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = SENSITIVE_FIELDS.some((f) => key.toLowerCase().includes(f.toLowerCase()))
        ? '[REDACTED]'
        : this.sanitizeValue(value);
    }
    return result;
  }

  /**
   * Get the underlying Winston logger instance (for testing).
   */
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }

  getServiceName(): string {
    return this.serviceName;
  }
}
