import { InvalidTransitionException } from '@common/exceptions/seat-inventory.exceptions';
import { Booking, BookingStatus } from './entities/booking.entity';
import { BookingHistoryAction } from './entities/booking-history.entity';

const ALLOWED_TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  [BookingStatus.PENDING]: [
    BookingStatus.CONFIRMED,
    BookingStatus.CANCELLED,
    BookingStatus.EXPIRED,
  ],
  [BookingStatus.CONFIRMED]: [BookingStatus.CANCELLED],
  [BookingStatus.CANCELLED]: [],
  [BookingStatus.EXPIRED]: [],
};

export const HISTORY_ACTION_FOR: Record<
  Exclude<BookingStatus, BookingStatus.PENDING>,
  BookingHistoryAction
> = {
  [BookingStatus.CONFIRMED]: BookingHistoryAction.CONFIRMED,
  [BookingStatus.CANCELLED]: BookingHistoryAction.CANCELLED,
  [BookingStatus.EXPIRED]: BookingHistoryAction.EXPIRED,
};

type BookingClock = Pick<Booking, 'status' | 'expiresAt'>;

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(
  booking: Pick<Booking, 'id' | 'status'>,
  to: BookingStatus,
  reason?: string,
): void {
  if (!canTransition(booking.status, to)) {
    throw new InvalidTransitionException(booking.id, booking.status, to, reason);
  }
}

/** PENDING bookings stay payable up to and including `expiresAt`. */
export function isPendingExpired(booking: BookingClock, now: Date): boolean {
  return (
    booking.status === BookingStatus.PENDING && now.getTime() > booking.expiresAt.getTime()
  );
}

/**
 * Status as every read path must report it: a PENDING booking past its
 * expiry is EXPIRED even before the sweep has rewritten the row.
 */
export function effectiveStatus(booking: BookingClock, now: Date): BookingStatus {
  return isPendingExpired(booking, now) ? BookingStatus.EXPIRED : booking.status;
}

/** Whether the booking's seats are taken for its showing. */
export function holdsSeats(booking: BookingClock, now: Date): boolean {
  const status = effectiveStatus(booking, now);
  return status === BookingStatus.PENDING || status === BookingStatus.CONFIRMED;
}
