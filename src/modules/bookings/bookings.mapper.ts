import { seatLabel } from '@modules/catalog/entities/seat.entity';
import { Booking } from './entities/booking.entity';
import { BookingHistory } from './entities/booking-history.entity';
import { BookingResponseDto } from './dto/booking-response.dto';
import { BookingHistoryResponseDto } from './dto/booking-history-response.dto';
import { effectiveStatus } from './booking-state-machine';

export function toBookingResponse(booking: Booking, now: Date): BookingResponseDto {
  return {
    bookingId: booking.id,
    bookingReference: booking.bookingReference,
    userId: booking.userId,
    showingId: booking.showingId,
    status: effectiveStatus(booking, now),
    totalAmount: Number(booking.totalAmount),
    bookedAt: booking.bookedAt,
    expiresAt: booking.expiresAt,
    confirmedAt: booking.confirmedAt,
    cancelledAt: booking.cancelledAt,
    cancellationReason: booking.cancellationReason,
    paymentMethod: booking.paymentMethod,
    notes: booking.notes,
    seats:
      booking.seats?.map((bookedSeat) => ({
        seatId: bookedSeat.seatId,
        label: bookedSeat.seat ? seatLabel(bookedSeat.seat) : undefined,
        pricePaid: Number(bookedSeat.pricePaid),
      })) ?? [],
  };
}

export function toHistoryResponse(entry: BookingHistory): BookingHistoryResponseDto {
  return {
    action: entry.action,
    actor: entry.actor,
    occurredAt: entry.occurredAt,
    metadata: entry.metadata,
  };
}
