import { toCents, fromCents } from '@common/utils/money.util';
import { SeatTier } from './entities/seat.entity';

export const TIER_PRICE_MULTIPLIERS: Record<SeatTier, number> = {
  [SeatTier.STANDARD]: 1,
  [SeatTier.PREMIUM]: 1.25,
  [SeatTier.VIP]: 1.5,
};

/** Price of one seat of `tier` for a showing whose base price is `basePrice`. */
export function priceForTier(basePrice: number | string, tier: SeatTier): number {
  return fromCents(Math.round(toCents(basePrice) * TIER_PRICE_MULTIPLIERS[tier]));
}
