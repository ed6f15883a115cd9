import { registerAs } from '@nestjs/config';

export const DEFAULT_HOLD_TTL_MINUTES = 15;
export const DEFAULT_BOOKING_TTL_MINUTES = 15;
export const DEFAULT_SWEEP_BATCH_LIMIT = 50;

export interface ReservationSettings {
  holdTtlMinutes: number;
  bookingTtlMinutes: number;
  sweepBatchLimit: number;
}

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const reservationConfig = registerAs(
  'reservation',
  (): ReservationSettings => ({
    holdTtlMinutes: readPositiveInt(process.env.HOLD_TTL_MINUTES, DEFAULT_HOLD_TTL_MINUTES),
    bookingTtlMinutes: readPositiveInt(
      process.env.BOOKING_TTL_MINUTES,
      DEFAULT_BOOKING_TTL_MINUTES,
    ),
    sweepBatchLimit: readPositiveInt(process.env.SWEEP_BATCH_LIMIT, DEFAULT_SWEEP_BATCH_LIMIT),
  }),
);
