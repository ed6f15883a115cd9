import { ConflictException, HttpStatus, NotFoundException } from '@nestjs/common';

export type SeatInventoryErrorCode =
  | 'SeatUnavailable'
  | 'BookingExpired'
  | 'InvalidTransition'
  | 'NotFound';

export interface SeatInventoryErrorBody {
  statusCode: number;
  error: SeatInventoryErrorCode;
  message: string;
  details: Record<string, unknown>;
}

function conflictBody(
  error: SeatInventoryErrorCode,
  message: string,
  details: Record<string, unknown>,
): SeatInventoryErrorBody {
  return { statusCode: HttpStatus.CONFLICT, error, message, details };
}

/**
 * The seat is held or booked by someone else, or is physically out of
 * service. The caller may retry with a different seat.
 */
export class SeatUnavailableException extends ConflictException {
  readonly code: SeatInventoryErrorCode = 'SeatUnavailable';

  constructor(
    readonly showingId: string,
    readonly seatIds: string[],
    readonly seatLabels: string[] = [],
  ) {
    super(
      conflictBody(
        'SeatUnavailable',
        `Seats not available: ${(seatLabels.length > 0 ? seatLabels : seatIds).join(', ')}`,
        { showingId, seatIds, seatLabels },
      ),
    );
  }
}

export class BookingExpiredException extends ConflictException {
  readonly code: SeatInventoryErrorCode = 'BookingExpired';

  constructor(
    readonly bookingId: string,
    readonly expiredAt: Date,
  ) {
    super(
      conflictBody('BookingExpired', `Booking ${bookingId} expired at ${expiredAt.toISOString()}`, {
        bookingId,
        expiredAt: expiredAt.toISOString(),
      }),
    );
  }
}

export class InvalidTransitionException extends ConflictException {
  readonly code: SeatInventoryErrorCode = 'InvalidTransition';

  constructor(
    readonly bookingId: string,
    readonly currentStatus: string,
    readonly attemptedStatus: string,
    reason?: string,
  ) {
    super(
      conflictBody(
        'InvalidTransition',
        `Booking ${bookingId} cannot move from ${currentStatus} to ${attemptedStatus}` +
          (reason ? `: ${reason}` : ''),
        { bookingId, currentStatus, attemptedStatus },
      ),
    );
  }
}

export type NotFoundResource = 'Hold' | 'Booking' | 'Showing' | 'Seat';

export class ResourceNotFoundException extends NotFoundException {
  readonly code: SeatInventoryErrorCode = 'NotFound';

  constructor(
    readonly resource: NotFoundResource,
    readonly resourceId: string,
  ) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'NotFound',
      message: `${resource} with ID ${resourceId} not found`,
      details: { resource, id: resourceId },
    });
  }
}
