import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Response } from 'express';
import Redis from 'ioredis';
import { REDIS_CLIENT } from '@infrastructure/redis/redis.constants';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';

export const RATE_LIMIT_KEY = 'rateLimit';

export interface RateLimitConfig {
  points: number;
  duration: number;
  blockDuration?: number;
  keyPrefix: string;
}

export type RateLimitProfile = 'read' | 'hold' | 'checkout';

export const RATE_LIMIT_PROFILES: Record<RateLimitProfile, RateLimitConfig> = {
  read: { points: 120, duration: 60, keyPrefix: 'rl:read' },
  hold: { points: 30, duration: 60, blockDuration: 60, keyPrefix: 'rl:hold' },
  checkout: { points: 10, duration: 60, blockDuration: 300, keyPrefix: 'rl:checkout' },
};

export const DEFAULT_RATE_LIMIT: RateLimitConfig = RATE_LIMIT_PROFILES.read;

// Increments the window counter and sets its TTL on first hit, atomically.
const INCREMENT_WINDOW_SCRIPT = `
  local current = redis.call('INCR', KEYS[1])
  if current == 1 then
    redis.call('EXPIRE', KEYS[1], ARGV[1])
  end
  return current
`;

interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;
  retryAfter: number;
}

/**
 * Fixed-window limiter keyed by caller identity (user id when the identity
 * guard ran, client address otherwise). Fails open when Redis is down.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly reflector: Reflector,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const config = this.getRateLimitConfig(context);
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const key = `${config.keyPrefix}:${this.identify(request)}`;

    let result: RateLimitResult;
    try {
      result = await this.consume(key, config);
    } catch (error) {
      const errMsg = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Rate limit check failed: ${errMsg}`);
      return true;
    }

    const response = context.switchToHttp().getResponse<Response>();
    response.set('X-RateLimit-Limit', config.points.toString());
    response.set('X-RateLimit-Remaining', result.remaining.toString());
    response.set('X-RateLimit-Reset', result.resetTime.toString());

    if (!result.allowed) {
      response.set('Retry-After', result.retryAfter.toString());
      this.logger.warn(`Rate limit exceeded for ${key}`);
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: 'Too many requests, please try again later',
          error: 'Too Many Requests',
          retryAfter: result.retryAfter,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    return true;
  }

  private getRateLimitConfig(context: ExecutionContext): RateLimitConfig {
    const profile = this.reflector.getAllAndOverride<RateLimitProfile | undefined>(
      RATE_LIMIT_KEY,
      [context.getHandler(), context.getClass()],
    );
    return profile ? RATE_LIMIT_PROFILES[profile] : DEFAULT_RATE_LIMIT;
  }

  private identify(request: AuthenticatedRequest): string {
    if (request.user?.id) {
      return `user:${request.user.id}`;
    }

    const forwardedFor = request.headers['x-forwarded-for'];
    const ip =
      (Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor) ||
      request.ip ||
      request.socket.remoteAddress ||
      'unknown';

    return `ip:${ip}`;
  }

  private async consume(key: string, config: RateLimitConfig): Promise<RateLimitResult> {
    const now = Date.now();
    const windowMs = config.duration * 1000;
    const blockKey = `${key}:blocked`;

    const blockedTtl = await this.redis.ttl(blockKey);
    if (blockedTtl > 0) {
      return {
        allowed: false,
        remaining: 0,
        resetTime: now + blockedTtl * 1000,
        retryAfter: blockedTtl,
      };
    }

    const windowKey = `${key}:${Math.floor(now / windowMs)}`;
    const count = Number(
      await this.redis.eval(INCREMENT_WINDOW_SCRIPT, 1, windowKey, config.duration),
    );
    const resetTime = (Math.floor(now / windowMs) + 1) * windowMs;

    if (count > config.points) {
      if (config.blockDuration) {
        await this.redis.setex(blockKey, config.blockDuration, '1');
      }
      return {
        allowed: false,
        remaining: 0,
        resetTime,
        retryAfter: config.blockDuration ?? Math.ceil((resetTime - now) / 1000),
      };
    }

    return { allowed: true, remaining: config.points - count, resetTime, retryAfter: 0 };
  }
}
