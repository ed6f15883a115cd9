import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { CLOCK, Clock, addMinutes } from '@common/clock/clock';
import {
  BookingExpiredException,
  InvalidTransitionException,
  ResourceNotFoundException,
  SeatUnavailableException,
} from '@common/exceptions/seat-inventory.exceptions';
import { isSerializationFailure, isUniqueViolation } from '@common/utils/error.util';
import { sumAmounts } from '@common/utils/money.util';
import {
  executeInSerializableTransaction,
  executeInTransaction,
} from '@infrastructure/database/transaction.util';
import {
  DEFAULT_BOOKING_TTL_MINUTES,
  DEFAULT_SWEEP_BATCH_LIMIT,
} from '@config/reservation.config';
import { CatalogService } from '@modules/catalog/catalog.service';
import { SeatStatus, seatLabel } from '@modules/catalog/entities/seat.entity';
import { AvailabilityService } from '@modules/availability/availability.service';
import { claimsBlocking } from '@modules/availability/seat-claims';
import { SeatReservation } from '@modules/reservations/entities/seat-reservation.entity';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { Booking, BookingStatus } from './entities/booking.entity';
import { BookedSeat } from './entities/booked-seat.entity';
import {
  BookingHistory,
  BookingHistoryAction,
  SYSTEM_ACTOR,
} from './entities/booking-history.entity';
import {
  HISTORY_ACTION_FOR,
  assertTransition,
  effectiveStatus,
  isPendingExpired,
} from './booking-state-machine';
import { generateBookingReference } from './booking-reference';
import { CreateBookingDto } from './dto/create-booking.dto';
import { ConfirmBookingDto } from './dto/confirm-booking.dto';

export const ABANDONED_REASON = 'abandoned';

type TransitionOutcome =
  | { kind: 'applied'; booking: Booking }
  | { kind: 'expired'; booking: Booking };

type TerminalStatus = Exclude<BookingStatus, BookingStatus.PENDING>;

@Injectable()
export class BookingsService {
  private readonly logger = new Logger(BookingsService.name);
  private readonly bookingTtlMinutes: number;
  private readonly sweepBatchLimit: number;

  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    @InjectRepository(BookingHistory)
    private readonly historyRepository: Repository<BookingHistory>,
    private readonly dataSource: DataSource,
    private readonly catalogService: CatalogService,
    private readonly availabilityService: AvailabilityService,
    private readonly eventPublisher: EventPublisher,
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.bookingTtlMinutes =
      this.configService.get<number>('reservation.bookingTtlMinutes') ??
      DEFAULT_BOOKING_TTL_MINUTES;
    this.sweepBatchLimit =
      this.configService.get<number>('reservation.sweepBatchLimit') ?? DEFAULT_SWEEP_BATCH_LIMIT;
  }

  /**
   * Books every requested seat or none of them. The caller's own live
   * holds on those seats are turned into the booking; any other claim
   * fails the whole request.
   */
  async createBooking(userId: string, dto: CreateBookingDto): Promise<Booking> {
    const seatIds = [...new Set(dto.seatIds)].sort();

    if (seatIds.length === 0) {
      throw new BadRequestException('At least one seat is required');
    }
    if (seatIds.length !== dto.seatIds.length) {
      throw new BadRequestException('Seat ids must not repeat');
    }

    let booking: Booking;

    try {
      booking = await executeInSerializableTransaction(
        this.dataSource,
        async (manager) => {
          const now = this.clock.now();
          const showing = await this.catalogService.findShowingById(dto.showingId, manager);
          const seats = await this.catalogService.lockSeatsForShowing(manager, showing, seatIds);

          const claims = await this.availabilityService.findSeatClaims(
            manager,
            showing.id,
            now,
            seatIds,
          );
          const blocked = new Set(claimsBlocking(claims, userId).map((claim) => claim.seatId));
          const unavailable = seats.filter(
            (seat) => seat.status !== SeatStatus.AVAILABLE || blocked.has(seat.id),
          );

          if (unavailable.length > 0) {
            throw new SeatUnavailableException(
              showing.id,
              unavailable.map((seat) => seat.id),
              unavailable.map(seatLabel),
            );
          }

          const ownHoldIds = claims
            .filter((claim) => claim.kind === 'HOLD' && claim.ownerId === userId)
            .map((claim) => claim.sourceId);
          if (ownHoldIds.length > 0) {
            await manager.delete(SeatReservation, ownHoldIds);
          }

          const bookedSeats = seats.map((seat) =>
            manager.create(BookedSeat, {
              seatId: seat.id,
              pricePaid: this.catalogService.priceFor(showing, seat),
            }),
          );

          const created = manager.create(Booking, {
            bookingReference: generateBookingReference(),
            userId,
            showingId: showing.id,
            totalAmount: sumAmounts(bookedSeats.map((bookedSeat) => bookedSeat.pricePaid)),
            status: BookingStatus.PENDING,
            bookedAt: now,
            expiresAt: addMinutes(now, this.bookingTtlMinutes),
            confirmedAt: null,
            cancelledAt: null,
            cancellationReason: null,
            paymentMethod: null,
            paymentReference: null,
            notes: dto.notes ?? null,
            seats: bookedSeats,
          });

          const saved = await manager.save(created);

          await this.recordHistory(manager, saved, BookingHistoryAction.CREATED, userId, now, {
            seatIds,
            totalAmount: saved.totalAmount,
            consumedHoldIds: ownHoldIds,
          });

          return saved;
        },
        this.logger,
        'createBooking',
      );
    } catch (error) {
      if (isUniqueViolation(error) || isSerializationFailure(error)) {
        this.logger.warn(`Booking race lost on showing ${dto.showingId}: ${seatIds.join(', ')}`);
        throw new SeatUnavailableException(dto.showingId, seatIds);
      }
      throw error;
    }

    this.logger.log(
      `Booking created: ${booking.id} (${booking.bookingReference}) for ${seatIds.length} seat(s)`,
    );
    await this.eventPublisher.publishBookingEvent('booking.created', booking);

    return booking;
  }

  /**
   * Records payment. A booking found past its expiry is committed as
   * EXPIRED before {@link BookingExpiredException} reaches the caller.
   */
  async confirmBooking(
    userId: string,
    bookingId: string,
    dto: ConfirmBookingDto,
  ): Promise<Booking> {
    const outcome = await executeInTransaction(
      this.dataSource,
      async (manager): Promise<TransitionOutcome> => {
        const now = this.clock.now();
        const booking = await this.lockOwnedBooking(manager, userId, bookingId);

        if (isPendingExpired(booking, now)) {
          return this.expireInTransaction(manager, booking, now, 'confirm');
        }

        if (booking.status === BookingStatus.EXPIRED) {
          throw new BookingExpiredException(booking.id, booking.expiresAt);
        }

        booking.paymentMethod = dto.paymentMethod;
        booking.paymentReference = dto.paymentReference;
        const confirmed = await this.applyTransition(
          manager,
          booking,
          BookingStatus.CONFIRMED,
          userId,
          now,
          { paymentMethod: dto.paymentMethod, paymentReference: dto.paymentReference },
        );
        return { kind: 'applied', booking: confirmed };
      },
    );

    return this.settle(outcome, 'booking.confirmed');
  }

  async cancelBooking(userId: string, bookingId: string, reason: string): Promise<Booking> {
    const outcome = await executeInTransaction(
      this.dataSource,
      async (manager): Promise<TransitionOutcome> => {
        const now = this.clock.now();
        const booking = await this.lockOwnedBooking(manager, userId, bookingId);

        if (booking.status !== BookingStatus.CONFIRMED) {
          throw new InvalidTransitionException(
            booking.id,
            effectiveStatus(booking, now),
            BookingStatus.CANCELLED,
            'only confirmed bookings can be cancelled',
          );
        }

        const showing = await this.catalogService.findShowingById(booking.showingId, manager);
        if (now.getTime() >= showing.startTime.getTime()) {
          throw new InvalidTransitionException(
            booking.id,
            booking.status,
            BookingStatus.CANCELLED,
            'the showing has already started',
          );
        }

        const cancelled = await this.applyTransition(
          manager,
          booking,
          BookingStatus.CANCELLED,
          userId,
          now,
          { reason },
          reason,
        );
        return { kind: 'applied', booking: cancelled };
      },
    );

    return this.settle(outcome, 'booking.cancelled');
  }

  /** Gives up an unpaid checkout so its seats free up before the expiry. */
  async abandonBooking(userId: string, bookingId: string): Promise<Booking> {
    const outcome = await executeInTransaction(
      this.dataSource,
      async (manager): Promise<TransitionOutcome> => {
        const now = this.clock.now();
        const booking = await this.lockOwnedBooking(manager, userId, bookingId);

        if (isPendingExpired(booking, now)) {
          return this.expireInTransaction(manager, booking, now, 'abandon');
        }

        if (booking.status !== BookingStatus.PENDING) {
          throw new InvalidTransitionException(
            booking.id,
            booking.status,
            BookingStatus.CANCELLED,
            'only pending bookings can be abandoned',
          );
        }

        const abandoned = await this.applyTransition(
          manager,
          booking,
          BookingStatus.CANCELLED,
          userId,
          now,
          { reason: ABANDONED_REASON },
          ABANDONED_REASON,
        );
        return { kind: 'applied', booking: abandoned };
      },
    );

    return this.settle(outcome, 'booking.cancelled');
  }

  async findUserBookings(userId: string): Promise<Booking[]> {
    return this.bookingRepository.find({
      where: { userId },
      relations: { seats: { seat: true } },
      order: { bookedAt: 'DESC' },
    });
  }

  async findById(userId: string, bookingId: string): Promise<Booking> {
    const booking = await this.bookingRepository.findOne({
      where: { id: bookingId, userId },
      relations: { seats: { seat: true } },
    });

    if (!booking) {
      throw new ResourceNotFoundException('Booking', bookingId);
    }

    return booking;
  }

  async getHistory(userId: string, bookingId: string): Promise<BookingHistory[]> {
    const booking = await this.findById(userId, bookingId);

    return this.historyRepository.find({
      where: { bookingId: booking.id },
      order: { occurredAt: 'ASC' },
    });
  }

  /** Moves up to `limit` PENDING bookings past their expiry to EXPIRED. */
  async expirePendingBookings(limit = this.sweepBatchLimit): Promise<number> {
    const now = this.clock.now();

    const expired = await executeInTransaction(this.dataSource, async (manager) => {
      const bookings = await manager
        .createQueryBuilder(Booking, 'booking')
        .where('booking.status = :status', { status: BookingStatus.PENDING })
        .andWhere('booking.expires_at < :now', { now })
        .orderBy('booking.expires_at', 'ASC')
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .limit(limit)
        .getMany();

      if (bookings.length === 0) {
        return [];
      }

      const seats = await manager.find(BookedSeat, {
        where: { bookingId: In(bookings.map((booking) => booking.id)) },
      });

      for (const booking of bookings) {
        booking.seats = seats.filter((seat) => seat.bookingId === booking.id);
        await this.applyTransition(manager, booking, BookingStatus.EXPIRED, SYSTEM_ACTOR, now, {
          expiredAt: booking.expiresAt.toISOString(),
        });
      }

      return bookings;
    });

    for (const booking of expired) {
      await this.publishRelease('booking.expired', booking);
    }

    return expired.length;
  }

  /** Publishes what a committed transition means and raises the deferred expiry. */
  private async settle(
    outcome: TransitionOutcome,
    appliedEvent: 'booking.confirmed' | 'booking.cancelled',
  ): Promise<Booking> {
    const { booking } = outcome;

    if (outcome.kind === 'expired') {
      await this.publishRelease('booking.expired', booking);
      throw new BookingExpiredException(booking.id, booking.expiresAt);
    }

    if (appliedEvent === 'booking.cancelled') {
      await this.publishRelease(appliedEvent, booking);
    } else {
      await this.eventPublisher.publishBookingEvent(appliedEvent, booking);
    }

    return booking;
  }

  private async publishRelease(
    type: 'booking.cancelled' | 'booking.expired',
    booking: Booking,
  ): Promise<void> {
    await this.eventPublisher.publishBookingEvent(type, booking);
    await this.eventPublisher.publishSeatReleased(
      booking.showingId,
      booking.seats?.map((seat) => seat.seatId) ?? [],
    );
  }

  private async lockOwnedBooking(
    manager: EntityManager,
    userId: string,
    bookingId: string,
  ): Promise<Booking> {
    // locked without joins: FOR UPDATE cannot apply to the nullable side of an outer join
    const booking = await manager.findOne(Booking, {
      where: { id: bookingId, userId },
      lock: { mode: 'pessimistic_write' },
    });

    if (!booking) {
      throw new ResourceNotFoundException('Booking', bookingId);
    }

    booking.seats = await manager.find(BookedSeat, { where: { bookingId: booking.id } });
    return booking;
  }

  private async expireInTransaction(
    manager: EntityManager,
    booking: Booking,
    now: Date,
    detectedBy: string,
  ): Promise<TransitionOutcome> {
    const expired = await this.applyTransition(
      manager,
      booking,
      BookingStatus.EXPIRED,
      SYSTEM_ACTOR,
      now,
      { expiredAt: booking.expiresAt.toISOString(), detectedBy },
    );
    return { kind: 'expired', booking: expired };
  }

  private async applyTransition(
    manager: EntityManager,
    booking: Booking,
    to: TerminalStatus,
    actor: string,
    now: Date,
    metadata: Record<string, unknown>,
    cancellationReason?: string,
  ): Promise<Booking> {
    assertTransition(booking, to);

    booking.status = to;
    if (to === BookingStatus.CONFIRMED) {
      booking.confirmedAt = now;
    }
    if (to === BookingStatus.CANCELLED) {
      booking.cancelledAt = now;
      booking.cancellationReason = cancellationReason ?? null;
    }

    await manager.update(
      Booking,
      { id: booking.id },
      {
        status: booking.status,
        confirmedAt: booking.confirmedAt,
        cancelledAt: booking.cancelledAt,
        cancellationReason: booking.cancellationReason,
        paymentMethod: booking.paymentMethod,
        paymentReference: booking.paymentReference,
      },
    );
    await this.recordHistory(manager, booking, HISTORY_ACTION_FOR[to], actor, now, metadata);

    this.logger.log(`Booking ${booking.id} is now ${to}`);
    return booking;
  }

  private async recordHistory(
    manager: EntityManager,
    booking: Pick<Booking, 'id'>,
    action: BookingHistoryAction,
    actor: string,
    occurredAt: Date,
    metadata: Record<string, unknown>,
  ): Promise<void> {
    const entry = manager.create(BookingHistory, {
      bookingId: booking.id,
      action,
      actor,
      occurredAt,
      metadata,
    });
    await manager.save(entry);
  }
}
