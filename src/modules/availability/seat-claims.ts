import { Seat, SeatStatus } from '@modules/catalog/entities/seat.entity';
import {
  SeatReservation,
  isHoldLive,
} from '@modules/reservations/entities/seat-reservation.entity';
import { BookedSeat } from '@modules/bookings/entities/booked-seat.entity';
import { holdsSeats } from '@modules/bookings/booking-state-machine';

export type SeatClaimKind = 'HOLD' | 'BOOKING';

/** Something that currently takes a seat away for a showing. */
export interface SeatClaim {
  seatId: string;
  kind: SeatClaimKind;
  ownerId: string;
  sourceId: string;
}

export type SeatState = 'AVAILABLE' | 'HELD' | 'BOOKED' | 'UNAVAILABLE';

export function collectSeatClaims(
  holds: SeatReservation[],
  bookedSeats: BookedSeat[],
  now: Date,
): SeatClaim[] {
  const claims: SeatClaim[] = [];

  for (const hold of holds) {
    if (isHoldLive(hold, now)) {
      claims.push({ seatId: hold.seatId, kind: 'HOLD', ownerId: hold.userId, sourceId: hold.id });
    }
  }

  for (const bookedSeat of bookedSeats) {
    const { booking } = bookedSeat;
    if (booking && holdsSeats(booking, now)) {
      claims.push({
        seatId: bookedSeat.seatId,
        kind: 'BOOKING',
        ownerId: booking.userId,
        sourceId: booking.id,
      });
    }
  }

  return claims;
}

/**
 * Physical condition first, then bookings, then holds: a seat under
 * maintenance is UNAVAILABLE whatever its claims say.
 */
export function resolveSeatState(
  seat: Pick<Seat, 'id' | 'status'>,
  claims: SeatClaim[],
): SeatState {
  if (seat.status !== SeatStatus.AVAILABLE) {
    return 'UNAVAILABLE';
  }

  const seatClaims = claims.filter((claim) => claim.seatId === seat.id);
  if (seatClaims.some((claim) => claim.kind === 'BOOKING')) {
    return 'BOOKED';
  }
  if (seatClaims.length > 0) {
    return 'HELD';
  }
  return 'AVAILABLE';
}

/** Claims that block `userId`; the caller's own holds do not count. */
export function claimsBlocking(claims: SeatClaim[], userId?: string): SeatClaim[] {
  return claims.filter((claim) => claim.kind === 'BOOKING' || claim.ownerId !== userId);
}
