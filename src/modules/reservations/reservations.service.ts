import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, LessThanOrEqual, MoreThan, Repository } from 'typeorm';
import { CLOCK, Clock, addMinutes } from '@common/clock/clock';
import {
  ResourceNotFoundException,
  SeatUnavailableException,
} from '@common/exceptions/seat-inventory.exceptions';
import { isSerializationFailure, isUniqueViolation } from '@common/utils/error.util';
import {
  executeInSerializableTransaction,
  executeInTransaction,
} from '@infrastructure/database/transaction.util';
import {
  DEFAULT_HOLD_TTL_MINUTES,
  DEFAULT_SWEEP_BATCH_LIMIT,
} from '@config/reservation.config';
import { CatalogService } from '@modules/catalog/catalog.service';
import { SeatStatus, seatLabel } from '@modules/catalog/entities/seat.entity';
import { AvailabilityService } from '@modules/availability/availability.service';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { SeatReservation, isHoldLive } from './entities/seat-reservation.entity';
import { CreateHoldDto } from './dto/create-hold.dto';

export const MIN_HOLD_EXTENSION_MINUTES = 1;
export const MAX_HOLD_EXTENSION_MINUTES = 15;

@Injectable()
export class ReservationsService {
  private readonly logger = new Logger(ReservationsService.name);
  private readonly holdTtlMinutes: number;
  private readonly sweepBatchLimit: number;

  constructor(
    @InjectRepository(SeatReservation)
    private readonly holdRepository: Repository<SeatReservation>,
    private readonly dataSource: DataSource,
    private readonly catalogService: CatalogService,
    private readonly availabilityService: AvailabilityService,
    private readonly eventPublisher: EventPublisher,
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.holdTtlMinutes =
      this.configService.get<number>('reservation.holdTtlMinutes') ?? DEFAULT_HOLD_TTL_MINUTES;
    this.sweepBatchLimit =
      this.configService.get<number>('reservation.sweepBatchLimit') ?? DEFAULT_SWEEP_BATCH_LIMIT;
  }

  /**
   * Places a hold on one seat. The seat row is locked, every claim on the
   * pair is re-read in the same SERIALIZABLE transaction, and the unique
   * (showing, seat) key decides any race that gets past both.
   */
  async createHold(userId: string, dto: CreateHoldDto): Promise<SeatReservation> {
    let hold: SeatReservation;

    try {
      hold = await executeInSerializableTransaction(
        this.dataSource,
        async (manager) => {
          const now = this.clock.now();
          const showing = await this.catalogService.findShowingById(dto.showingId, manager);
          const [seat] = await this.catalogService.lockSeatsForShowing(manager, showing, [
            dto.seatId,
          ]);

          if (seat.status !== SeatStatus.AVAILABLE) {
            throw new SeatUnavailableException(showing.id, [seat.id], [seatLabel(seat)]);
          }

          const claims = await this.availabilityService.findSeatClaims(
            manager,
            showing.id,
            now,
            [seat.id],
          );
          if (claims.length > 0) {
            throw new SeatUnavailableException(showing.id, [seat.id], [seatLabel(seat)]);
          }

          // a dead hold still owns the unique key until it is removed
          await manager.delete(SeatReservation, {
            showingId: showing.id,
            seatId: seat.id,
            expiresAt: LessThanOrEqual(now),
          });

          const created = manager.create(SeatReservation, {
            userId,
            showingId: showing.id,
            seatId: seat.id,
            sessionKey: dto.sessionKey ?? null,
            createdAt: now,
            expiresAt: addMinutes(now, this.holdTtlMinutes),
          });

          return manager.save(created);
        },
        this.logger,
        'createHold',
      );
    } catch (error) {
      if (isUniqueViolation(error) || isSerializationFailure(error)) {
        this.logger.warn(`Hold race lost on seat ${dto.seatId} for showing ${dto.showingId}`);
        throw new SeatUnavailableException(dto.showingId, [dto.seatId]);
      }
      throw error;
    }

    this.logger.log(
      `Hold created: ${hold.id} on seat ${hold.seatId} until ${hold.expiresAt.toISOString()}`,
    );
    await this.eventPublisher.publishHoldEvent('hold.created', hold);

    return hold;
  }

  async extendHold(
    userId: string,
    holdId: string,
    minutes = MAX_HOLD_EXTENSION_MINUTES,
  ): Promise<SeatReservation> {
    if (
      !Number.isInteger(minutes) ||
      minutes < MIN_HOLD_EXTENSION_MINUTES ||
      minutes > MAX_HOLD_EXTENSION_MINUTES
    ) {
      throw new BadRequestException(
        `minutes must be between ${MIN_HOLD_EXTENSION_MINUTES} and ${MAX_HOLD_EXTENSION_MINUTES}`,
      );
    }

    const hold = await executeInTransaction(this.dataSource, async (manager) => {
      const found = await manager.findOne(SeatReservation, {
        where: { id: holdId, userId },
        lock: { mode: 'pessimistic_write' },
      });

      if (!found || !isHoldLive(found, this.clock.now())) {
        throw new ResourceNotFoundException('Hold', holdId);
      }

      found.expiresAt = addMinutes(found.expiresAt, minutes);
      return manager.save(found);
    });

    this.logger.log(`Hold extended: ${hold.id} until ${hold.expiresAt.toISOString()}`);

    return hold;
  }

  /** Deletes the caller's hold. Releasing a hold that is already gone is a no-op. */
  async releaseHold(userId: string, holdId: string): Promise<void> {
    const hold = await this.holdRepository.findOne({ where: { id: holdId, userId } });
    if (!hold) {
      return;
    }

    const result = await this.holdRepository.delete({ id: hold.id, userId });
    if (!result.affected) {
      return;
    }

    this.logger.log(`Hold released: ${hold.id}`);
    await this.eventPublisher.publishHoldEvent('hold.released', hold);
    await this.eventPublisher.publishSeatReleased(hold.showingId, [hold.seatId]);
  }

  async findUserHolds(userId: string): Promise<SeatReservation[]> {
    return this.holdRepository.find({
      where: { userId, expiresAt: MoreThan(this.clock.now()) },
      relations: { seat: true },
      order: { expiresAt: 'ASC' },
    });
  }

  /**
   * Removes up to `limit` dead holds. Rows locked by a concurrent hold
   * attempt are skipped and picked up by a later run.
   */
  async expireHolds(limit = this.sweepBatchLimit): Promise<number> {
    const now = this.clock.now();

    const expired = await executeInTransaction(this.dataSource, async (manager) => {
      const holds = await manager
        .createQueryBuilder(SeatReservation, 'hold')
        .where('hold.expires_at <= :now', { now })
        .orderBy('hold.expires_at', 'ASC')
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .limit(limit)
        .getMany();

      if (holds.length > 0) {
        await manager.delete(
          SeatReservation,
          holds.map((hold) => hold.id),
        );
      }

      return holds;
    });

    const releasedByShowing = new Map<string, string[]>();
    for (const hold of expired) {
      await this.eventPublisher.publishHoldEvent('hold.expired', hold);
      const seatIds = releasedByShowing.get(hold.showingId) ?? [];
      seatIds.push(hold.seatId);
      releasedByShowing.set(hold.showingId, seatIds);
    }
    for (const [showingId, seatIds] of releasedByShowing) {
      await this.eventPublisher.publishSeatReleased(showingId, seatIds);
    }

    return expired.length;
  }
}
