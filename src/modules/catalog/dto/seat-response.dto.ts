import { ApiProperty } from '@nestjs/swagger';
import { SeatStatus, SeatTier } from '../entities/seat.entity';

export class SeatResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'C7' })
  label!: string;

  @ApiProperty()
  row!: string;

  @ApiProperty()
  seatNumber!: number;

  @ApiProperty({ enum: SeatTier })
  tier!: SeatTier;

  @ApiProperty({ enum: SeatStatus, description: 'Physical condition of the seat' })
  status!: SeatStatus;

  @ApiProperty()
  isAccessible!: boolean;

  @ApiProperty()
  isCouple!: boolean;

  @ApiProperty()
  positionX!: number;

  @ApiProperty()
  positionY!: number;
}
