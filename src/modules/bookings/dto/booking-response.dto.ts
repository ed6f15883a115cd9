import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BookingStatus } from '../entities/booking.entity';

export class BookedSeatResponseDto {
  @ApiProperty()
  seatId!: string;

  @ApiPropertyOptional({ example: 'C7' })
  label?: string;

  @ApiProperty()
  pricePaid!: number;
}

export class BookingResponseDto {
  @ApiProperty()
  bookingId!: string;

  @ApiProperty({ example: 'BK-3F9A1C07D2E4' })
  bookingReference!: string;

  @ApiProperty()
  userId!: string;

  @ApiProperty()
  showingId!: string;

  @ApiProperty({ enum: BookingStatus })
  status!: BookingStatus;

  @ApiProperty()
  totalAmount!: number;

  @ApiProperty()
  bookedAt!: Date;

  @ApiProperty()
  expiresAt!: Date;

  @ApiProperty({ type: Date, nullable: true })
  confirmedAt!: Date | null;

  @ApiProperty({ type: Date, nullable: true })
  cancelledAt!: Date | null;

  @ApiProperty({ type: String, nullable: true })
  cancellationReason!: string | null;

  @ApiProperty({ type: String, nullable: true })
  paymentMethod!: string | null;

  @ApiProperty({ type: String, nullable: true })
  notes!: string | null;

  @ApiProperty({ type: [BookedSeatResponseDto] })
  seats!: BookedSeatResponseDto[];
}
