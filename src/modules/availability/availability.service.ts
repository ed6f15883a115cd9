import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager, FindOptionsWhere, In, MoreThan } from 'typeorm';
import { CLOCK, Clock } from '@common/clock/clock';
import { executeInTransaction } from '@infrastructure/database/transaction.util';
import { CatalogService } from '@modules/catalog/catalog.service';
import { Seat, seatLabel } from '@modules/catalog/entities/seat.entity';
import { SeatReservation } from '@modules/reservations/entities/seat-reservation.entity';
import { BookedSeat } from '@modules/bookings/entities/booked-seat.entity';
import { BookingStatus } from '@modules/bookings/entities/booking.entity';
import { SeatClaim, SeatState, collectSeatClaims, resolveSeatState } from './seat-claims';
import { SeatAvailabilityResponseDto } from './dto/seat-availability-response.dto';

@Injectable()
export class AvailabilityService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly catalogService: CatalogService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Live holds and seat-taking bookings for a showing, optionally narrowed
   * to `seatIds`. Pass the manager of the transaction that is about to
   * write so the check and the write see the same snapshot.
   */
  async findSeatClaims(
    manager: EntityManager,
    showingId: string,
    now: Date,
    seatIds?: string[],
  ): Promise<SeatClaim[]> {
    const holdWhere: FindOptionsWhere<SeatReservation> = { showingId, expiresAt: MoreThan(now) };
    const bookedWhere: FindOptionsWhere<BookedSeat> = {
      booking: { showingId, status: In([BookingStatus.PENDING, BookingStatus.CONFIRMED]) },
    };

    if (seatIds) {
      holdWhere.seatId = In(seatIds);
      bookedWhere.seatId = In(seatIds);
    }

    const holds = await manager.find(SeatReservation, { where: holdWhere });
    const bookedSeats = await manager.find(BookedSeat, {
      where: bookedWhere,
      relations: { booking: true },
    });

    return collectSeatClaims(holds, bookedSeats, now);
  }

  async availableSeats(
    showingId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Seat[]> {
    const showing = await this.catalogService.findShowingById(showingId, manager);
    const seats = await this.catalogService.findScreenSeats(showing.screenNumber, manager);
    const claims = await this.findSeatClaims(manager, showing.id, this.clock.now());

    return seats.filter((seat) => resolveSeatState(seat, claims) === 'AVAILABLE');
  }

  async isSeatAvailable(
    showingId: string,
    seatId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<boolean> {
    const showing = await this.catalogService.findShowingById(showingId, manager);
    const seat = await manager.findOne(Seat, { where: { id: seatId } });

    if (!seat || seat.screenNumber !== showing.screenNumber) {
      return false;
    }

    const claims = await this.findSeatClaims(manager, showing.id, this.clock.now(), [seat.id]);
    return resolveSeatState(seat, claims) === 'AVAILABLE';
  }

  /** Seat map of a showing, read from one consistent snapshot. */
  async getAvailability(showingId: string): Promise<SeatAvailabilityResponseDto> {
    const now = this.clock.now();

    const { showing, seats, claims } = await executeInTransaction(
      this.dataSource,
      async (manager) => {
        const found = await this.catalogService.findShowingById(showingId, manager);
        return {
          showing: found,
          seats: await this.catalogService.findScreenSeats(found.screenNumber, manager),
          claims: await this.findSeatClaims(manager, found.id, now),
        };
      },
      { isolationLevel: 'REPEATABLE READ' },
    );

    const counts: Record<SeatState, number> = { AVAILABLE: 0, HELD: 0, BOOKED: 0, UNAVAILABLE: 0 };
    const seatViews = seats.map((seat) => {
      const state = resolveSeatState(seat, claims);
      counts[state]++;
      return {
        id: seat.id,
        label: seatLabel(seat),
        tier: seat.tier,
        state,
        price: this.catalogService.priceFor(showing, seat),
      };
    });

    return {
      showingId: showing.id,
      screenNumber: showing.screenNumber,
      startTime: showing.startTime,
      asOf: now,
      totalSeats: seats.length,
      availableSeats: counts.AVAILABLE,
      heldSeats: counts.HELD,
      bookedSeats: counts.BOOKED,
      unavailableSeats: counts.UNAVAILABLE,
      availableSeatIds: seatViews
        .filter((view) => view.state === 'AVAILABLE')
        .map((view) => view.id),
      seats: seatViews,
    };
  }
}
