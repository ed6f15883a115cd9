import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';

/**
 * Identity established by {@link UserIdentityGuard}. Only the opaque user id
 * is needed by this service; everything else about the account lives with
 * the account service.
 */
export interface CurrentUserData {
  id: string;
}

export interface AuthenticatedRequest extends Request {
  user?: CurrentUserData;
}

/**
 * Extracts the caller's user id.
 *
 * @example
 * ```typescript
 * @Post()
 * create(@CurrentUser() userId: string, @Body() dto: CreateHoldDto) {}
 * ```
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  return request.user?.id ?? null;
});
