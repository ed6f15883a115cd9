import { Injectable, ConflictException, BadRequestException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, LessThan, MoreThan, Repository } from 'typeorm';
import { Showing } from './entities/showing.entity';
import { Seat, SeatStatus, SeatTier, seatLabel } from './entities/seat.entity';
import { CreateShowingDto } from './dto/create-showing.dto';
import { CreateSeatLayoutDto } from './dto/create-seat-layout.dto';
import { priceForTier } from './seat-pricing';
import { ResourceNotFoundException } from '@common/exceptions/seat-inventory.exceptions';
import { isExclusionViolation } from '@common/utils/error.util';

const ROW_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Read side of the catalog used by holds and bookings, plus the minimal
 * maintenance operations needed to put showings and seats in place.
 */
@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    @InjectRepository(Showing)
    private readonly showingRepository: Repository<Showing>,
    @InjectRepository(Seat)
    private readonly seatRepository: Repository<Seat>,
  ) {}

  async createShowing(dto: CreateShowingDto): Promise<Showing> {
    const startTime = new Date(dto.startTime);
    const endTime = new Date(dto.endTime);

    if (startTime.getTime() >= endTime.getTime()) {
      throw new BadRequestException('Showing must start before it ends');
    }

    const overlapping = await this.showingRepository.findOne({
      where: {
        screenNumber: dto.screenNumber,
        startTime: LessThan(endTime),
        endTime: MoreThan(startTime),
      },
    });

    if (overlapping) {
      throw new ConflictException(
        `Screen ${dto.screenNumber} already has showing ${overlapping.id} in that time window`,
      );
    }

    const showing = this.showingRepository.create({
      movieTitle: dto.movieTitle,
      screenNumber: dto.screenNumber,
      startTime,
      endTime,
      basePrice: dto.basePrice,
    });

    try {
      const saved = await this.showingRepository.save(showing);
      this.logger.log(`Showing created: ${saved.id} on screen ${saved.screenNumber}`);
      return saved;
    } catch (error) {
      // a concurrent insert slipped past the check above
      if (isExclusionViolation(error)) {
        throw new ConflictException(
          `Screen ${dto.screenNumber} already has a showing in that time window`,
        );
      }
      throw error;
    }
  }

  async findAllShowings(): Promise<Showing[]> {
    return this.showingRepository.find({ order: { startTime: 'ASC' } });
  }

  async findShowingById(
    id: string,
    manager: EntityManager = this.showingRepository.manager,
  ): Promise<Showing> {
    const showing = await manager.findOne(Showing, { where: { id } });

    if (!showing) {
      throw new ResourceNotFoundException('Showing', id);
    }

    return showing;
  }

  async createSeatLayout(screenNumber: number, dto: CreateSeatLayoutDto): Promise<Seat[]> {
    const existing = await this.seatRepository.count({ where: { screenNumber } });
    if (existing > 0) {
      throw new ConflictException(`Screen ${screenNumber} already has ${existing} seats`);
    }

    const seats = this.generateSeats(screenNumber, dto);
    const saved = await this.seatRepository.save(seats);

    this.logger.log(`Seat layout created for screen ${screenNumber}: ${saved.length} seats`);

    return saved;
  }

  async findScreenSeats(
    screenNumber: number,
    manager: EntityManager = this.seatRepository.manager,
  ): Promise<Seat[]> {
    return manager.find(Seat, {
      where: { screenNumber },
      order: { row: 'ASC', seatNumber: 'ASC' },
    });
  }

  /**
   * Loads the requested seats with a row lock, in id order so that
   * concurrent callers asking for overlapping seats queue instead of
   * deadlocking. Every seat must exist and sit on the showing's screen.
   */
  async lockSeatsForShowing(
    manager: EntityManager,
    showing: Showing,
    seatIds: string[],
  ): Promise<Seat[]> {
    const seats = await manager.find(Seat, {
      where: { id: In(seatIds) },
      order: { id: 'ASC' },
      lock: { mode: 'pessimistic_write' },
    });

    const foundIds = new Set(seats.map((seat) => seat.id));
    const missing = seatIds.filter((id) => !foundIds.has(id));
    if (missing.length > 0) {
      throw new BadRequestException(`Seats not found: ${missing.join(', ')}`);
    }

    const foreign = seats.filter((seat) => seat.screenNumber !== showing.screenNumber);
    if (foreign.length > 0) {
      throw new BadRequestException(
        `Seats ${foreign.map(seatLabel).join(', ')} are not on screen ${showing.screenNumber}`,
      );
    }

    return seats;
  }

  priceFor(showing: Showing, seat: Seat): number {
    return priceForTier(showing.basePrice, seat.tier);
  }

  private generateSeats(screenNumber: number, dto: CreateSeatLayoutDto): Seat[] {
    const premiumRows = new Set(dto.premiumRows ?? []);
    const vipRows = new Set(dto.vipRows ?? []);
    const accessible = new Set(dto.accessibleSeats ?? []);
    const seats: Seat[] = [];

    for (let rowIndex = 0; rowIndex < dto.rows; rowIndex++) {
      const row = ROW_LETTERS[rowIndex];
      const tier = vipRows.has(row)
        ? SeatTier.VIP
        : premiumRows.has(row)
          ? SeatTier.PREMIUM
          : SeatTier.STANDARD;

      for (let seatNumber = 1; seatNumber <= dto.seatsPerRow; seatNumber++) {
        seats.push(
          this.seatRepository.create({
            screenNumber,
            row,
            seatNumber,
            tier,
            status: SeatStatus.AVAILABLE,
            isAccessible: accessible.has(`${row}${seatNumber}`),
            isCouple: false,
            positionX: seatNumber,
            positionY: rowIndex + 1,
          }),
        );
      }
    }

    return seats;
  }
}
