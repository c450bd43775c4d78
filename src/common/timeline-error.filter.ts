import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { RateLimitError, TimelineError } from './errors.js';
import type { TimelineErrorCode } from './errors.js';

const STATUS_BY_CODE: Record<TimelineErrorCode, HttpStatus> = {
  PARSE: HttpStatus.BAD_REQUEST,
  UNAUTHORIZED: HttpStatus.UNAUTHORIZED,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  RATE_LIMIT: HttpStatus.TOO_MANY_REQUESTS,
  NETWORK: HttpStatus.BAD_GATEWAY,
  DUPLICATE: HttpStatus.CONFLICT,
  INVALID_RANGE: HttpStatus.BAD_REQUEST,
};

export interface TimelineErrorBody {
  statusCode: number;
  error: TimelineErrorCode;
  message: string;
  retryAfterSeconds?: number | null;
}

export function toErrorBody(error: TimelineError): TimelineErrorBody {
  const body: TimelineErrorBody = {
    statusCode: STATUS_BY_CODE[error.code],
    error: error.code,
    message: error.message,
  };
  if (error instanceof RateLimitError) body.retryAfterSeconds = error.retryAfterSeconds;
  return body;
}

@Catch(TimelineError)
export class TimelineErrorFilter implements ExceptionFilter<TimelineError> {
  private readonly logger = new Logger(TimelineErrorFilter.name);

  catch(error: TimelineError, host: ArgumentsHost) {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const body = toErrorBody(error);

    this.logger.warn(`${error.code}: ${error.message}`);

    if (error instanceof RateLimitError && error.retryAfterSeconds !== null) {
      reply.header('Retry-After', String(error.retryAfterSeconds));
    }
    reply.status(body.statusCode).send(body);
  }
}
