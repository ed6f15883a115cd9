import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';

export class CreateHoldDto {
  @ApiProperty({
    example: '550e8400-e29b-41d4-a716-446655440001',
    description: 'Showing ID',
  })
  @IsUUID()
  showingId!: string;

  @ApiProperty({
    example: '550e8400-e29b-41d4-a716-446655440002',
    description: 'Seat ID',
  })
  @IsUUID()
  seatId!: string;

  @ApiPropertyOptional({ description: 'Client session the hold belongs to', maxLength: 64 })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  sessionKey?: string;
}
