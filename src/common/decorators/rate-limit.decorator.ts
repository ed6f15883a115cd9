import { SetMetadata } from '@nestjs/common';
import { RATE_LIMIT_KEY, RateLimitProfile } from '../guards/rate-limit.guard';

export const RateLimit = (profile: RateLimitProfile) => SetMetadata(RATE_LIMIT_KEY, profile);

export const HoldRateLimit = () => RateLimit('hold');

export const CheckoutRateLimit = () => RateLimit('checkout');
