import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class HoldResponseDto {
  @ApiProperty()
  reservationId!: string;

  @ApiProperty()
  userId!: string;

  @ApiProperty()
  showingId!: string;

  @ApiProperty()
  seatId!: string;

  @ApiPropertyOptional({ example: 'C7' })
  seatLabel?: string;

  @ApiProperty({ type: String, nullable: true })
  sessionKey!: string | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  expiresAt!: Date;
}
