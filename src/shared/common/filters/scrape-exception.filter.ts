import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ScrapeError, ScrapeErrorKind } from '../errors/scrape.errors';

const STATUS_BY_KIND: Record<ScrapeErrorKind, HttpStatus> = {
  [ScrapeErrorKind.UNKNOWN_TASK]: HttpStatus.NOT_FOUND,
  [ScrapeErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ScrapeErrorKind.INVALID_LEVEL]: HttpStatus.BAD_REQUEST,
  [ScrapeErrorKind.INVALID_PARAMS]: HttpStatus.BAD_REQUEST,
  [ScrapeErrorKind.QUEUE_FULL]: HttpStatus.TOO_MANY_REQUESTS,
  [ScrapeErrorKind.NAVIGATION_FAILURE]: HttpStatus.BAD_GATEWAY,
  [ScrapeErrorKind.TIMEOUT]: HttpStatus.GATEWAY_TIMEOUT,
  [ScrapeErrorKind.INTERNAL]: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function httpStatusFor(kind: ScrapeErrorKind): HttpStatus {
  return STATUS_BY_KIND[kind];
}

@Catch(ScrapeError)
export class ScrapeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ScrapeExceptionFilter.name);

  catch(exception: ScrapeError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();
    const status = httpStatusFor(exception.kind);

    this.logger.warn(
      `${request.method} ${request.url} -> ${status} ${exception.kind}: ${exception.message}`,
    );

    response.status(status).send({
      statusCode: status,
      error: exception.kind,
      message: exception.message,
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }
}
