import { ApiProperty } from '@nestjs/swagger';
import { SeatTier } from '@modules/catalog/entities/seat.entity';
import { SeatState } from '../seat-claims';

export class SeatStateDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'C7' })
  label!: string;

  @ApiProperty({ enum: SeatTier })
  tier!: SeatTier;

  @ApiProperty({ enum: ['AVAILABLE', 'HELD', 'BOOKED', 'UNAVAILABLE'] })
  state!: SeatState;

  @ApiProperty({ description: 'Price of this seat for the showing' })
  price!: number;
}

export class SeatAvailabilityResponseDto {
  @ApiProperty()
  showingId!: string;

  @ApiProperty()
  screenNumber!: number;

  @ApiProperty()
  startTime!: Date;

  @ApiProperty({ description: 'Instant the availability was computed for' })
  asOf!: Date;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty()
  availableSeats!: number;

  @ApiProperty()
  heldSeats!: number;

  @ApiProperty()
  bookedSeats!: number;

  @ApiProperty()
  unavailableSeats!: number;

  @ApiProperty({ type: [String] })
  availableSeatIds!: string[];

  @ApiProperty({ type: [SeatStateDto] })
  seats!: SeatStateDto[];
}
