import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse } from './http-exception.types';
import { getErrorDetails, getErrorMessage, getErrorName } from '@common/utils/error.util';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;

    const message =
      status >= 500 && !(exception instanceof HttpException)
        ? 'Internal server error'
        : getErrorMessage(exception);
    const correlationId = request.headers['x-correlation-id'];

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error: getErrorName(exception, status),
      details: getErrorDetails(exception),
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      correlationId: Array.isArray(correlationId) ? correlationId[0] : correlationId,
    };

    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${JSON.stringify(getErrorMessage(exception))}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}`);
    }

    response.status(status).json(errorResponse);
  }
}
