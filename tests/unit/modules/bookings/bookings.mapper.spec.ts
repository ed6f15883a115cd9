import { toBookingResponse, toHistoryResponse } from '@modules/bookings/bookings.mapper';
import { Booking, BookingStatus } from '@modules/bookings/entities/booking.entity';
import { BookedSeat } from '@modules/bookings/entities/booked-seat.entity';
import {
  BookingHistory,
  BookingHistoryAction,
} from '@modules/bookings/entities/booking-history.entity';
import { Seat, SeatStatus, SeatTier } from '@modules/catalog/entities/seat.entity';

describe('bookings mapper', () => {
  const seat: Seat = {
    id: 'seat-1',
    screenNumber: 2,
    row: 'D',
    seatNumber: 4,
    tier: SeatTier.PREMIUM,
    status: SeatStatus.AVAILABLE,
    isAccessible: false,
    isCouple: false,
    positionX: 4,
    positionY: 4,
    createdAt: new Date('2026-02-01T00:00:00.000Z'),
  };

  const bookedSeat: BookedSeat = {
    id: 'booked-seat-1',
    bookingId: 'booking-1',
    seatId: seat.id,
    seat,
    pricePaid: 12.5,
  };

  const booking: Booking = {
    id: 'booking-1',
    bookingReference: 'BK-0123456789AB',
    userId: 'user-1',
    showingId: 'showing-1',
    totalAmount: 12.5,
    status: BookingStatus.PENDING,
    bookedAt: new Date('2026-03-01T10:00:00.000Z'),
    expiresAt: new Date('2026-03-01T10:15:00.000Z'),
    confirmedAt: null,
    cancelledAt: null,
    cancellationReason: null,
    paymentMethod: null,
    paymentReference: 'pay-0001',
    notes: null,
    seats: [bookedSeat],
    updatedAt: new Date('2026-03-01T10:00:00.000Z'),
  };

  describe('toBookingResponse', () => {
    it('should map a live pending booking', () => {
      const response = toBookingResponse(booking, new Date('2026-03-01T10:05:00.000Z'));

      expect(response).toEqual({
        bookingId: 'booking-1',
        bookingReference: 'BK-0123456789AB',
        userId: 'user-1',
        showingId: 'showing-1',
        status: BookingStatus.PENDING,
        totalAmount: 12.5,
        bookedAt: booking.bookedAt,
        expiresAt: booking.expiresAt,
        confirmedAt: null,
        cancelledAt: null,
        cancellationReason: null,
        paymentMethod: null,
        notes: null,
        seats: [{ seatId: 'seat-1', label: 'D4', pricePaid: 12.5 }],
      });
    });

    it('should report a lapsed pending booking as EXPIRED before any sweep', () => {
      const response = toBookingResponse(booking, new Date('2026-03-01T10:16:00.000Z'));

      expect(response.status).toBe(BookingStatus.EXPIRED);
    });

    it('should convert decimal strings from the driver to numbers', () => {
      const fromDriver = Object.assign(new Booking(), booking, {
        totalAmount: '25.50',
        seats: [Object.assign(new BookedSeat(), bookedSeat, { pricePaid: '25.50', seat: undefined })],
      });

      const response = toBookingResponse(fromDriver, new Date('2026-03-01T10:05:00.000Z'));

      expect(response.totalAmount).toBe(25.5);
      expect(response.seats).toEqual([{ seatId: 'seat-1', label: undefined, pricePaid: 25.5 }]);
    });

    it('should return no seats when they were not loaded', () => {
      const response = toBookingResponse(
        { ...booking, seats: undefined },
        new Date('2026-03-01T10:05:00.000Z'),
      );

      expect(response.seats).toEqual([]);
    });
  });

  describe('toHistoryResponse', () => {
    it('should map an audit entry', () => {
      const entry: BookingHistory = {
        id: 'history-1',
        bookingId: 'booking-1',
        action: BookingHistoryAction.CONFIRMED,
        actor: 'user-1',
        occurredAt: new Date('2026-03-01T10:05:00.000Z'),
        metadata: { paymentMethod: 'card' },
      };

      expect(toHistoryResponse(entry)).toEqual({
        action: BookingHistoryAction.CONFIRMED,
        actor: 'user-1',
        occurredAt: entry.occurredAt,
        metadata: { paymentMethod: 'card' },
      });
    });
  });
});
