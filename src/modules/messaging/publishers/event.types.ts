export type EventType =
  | 'hold.created'
  | 'hold.released'
  | 'hold.expired'
  | 'booking.created'
  | 'booking.confirmed'
  | 'booking.cancelled'
  | 'booking.expired'
  | 'seat.released';

export interface BaseEvent {
  eventId: string;
  type: EventType;
  timestamp: string;
}

export interface HoldEvent extends BaseEvent {
  type: 'hold.created' | 'hold.released' | 'hold.expired';
  holdId: string;
  userId: string;
  showingId: string;
  seatId: string;
  expiresAt: string;
}

export interface BookingEvent extends BaseEvent {
  type: 'booking.created' | 'booking.confirmed' | 'booking.cancelled' | 'booking.expired';
  bookingId: string;
  bookingReference: string;
  userId: string;
  showingId: string;
  seatIds: string[];
  totalAmount: number;
}

export interface SeatEvent extends BaseEvent {
  type: 'seat.released';
  showingId: string;
  seatIds: string[];
}

export type SeatingEvent = HoldEvent | BookingEvent | SeatEvent;
