import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { isUUID } from 'class-validator';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';

export const USER_ID_HEADER = 'x-user-id';

/**
 * Trusts the user id forwarded by the authenticating gateway in the
 * `X-User-Id` header and attaches it to the request.
 */
@Injectable()
export class UserIdentityGuard implements CanActivate {
  private readonly logger = new Logger(UserIdentityGuard.name);

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const header = request.headers[USER_ID_HEADER];
    const userId = Array.isArray(header) ? header[0] : header;

    if (!userId || !isUUID(userId)) {
      this.logger.warn(
        `[SECURITY] Missing or malformed user id on ${request.method} ${request.url}`,
      );
      throw new UnauthorizedException({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'A valid X-User-Id header is required',
      });
    }

    request.user = { id: userId };
    return true;
  }
}
