import { ApiProperty } from '@nestjs/swagger';
import { BookingHistoryAction } from '../entities/booking-history.entity';

export class BookingHistoryResponseDto {
  @ApiProperty({ enum: BookingHistoryAction })
  action!: BookingHistoryAction;

  @ApiProperty({ description: 'User id, or "system" for automatic transitions' })
  actor!: string;

  @ApiProperty()
  occurredAt!: Date;

  @ApiProperty({ type: Object, nullable: true })
  metadata!: Record<string, unknown> | null;
}
