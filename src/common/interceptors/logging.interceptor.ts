import { Injectable, NestInterceptor, ExecutionContext, CallHandler, Logger } from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Response } from 'express';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';
import { getErrorMessageString, getErrorStatus } from '../utils/error.util';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const { method, url } = request;
    const correlationId = request.headers['x-correlation-id'];
    const trace = typeof correlationId === 'string' ? ` [${correlationId}]` : '';
    const startedAt = Date.now();

    this.logger.log(`[REQUEST] ${method} ${url}${trace} - IP: ${request.ip}`);

    const body: unknown = request.body;
    if (body && typeof body === 'object' && Object.keys(body).length > 0) {
      this.logger.debug(`[REQUEST BODY] ${JSON.stringify(body)}`);
    }

    return next.handle().pipe(
      tap({
        next: () => {
          const response = context.switchToHttp().getResponse<Response>();
          const user = request.user ? ` user=${request.user.id}` : '';
          this.logger.log(
            `[RESPONSE] ${method} ${url}${trace} - ${response.statusCode} - ${Date.now() - startedAt}ms${user}`,
          );
        },
        error: (error: unknown) => {
          this.logger.error(
            `[ERROR] ${method} ${url}${trace} - ${getErrorStatus(error)} - ${Date.now() - startedAt}ms - ${getErrorMessageString(error)}`,
          );
        },
      }),
    );
  }
}
