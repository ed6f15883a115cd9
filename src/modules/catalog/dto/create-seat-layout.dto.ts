import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsArray, IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

export class CreateSeatLayoutDto {
  @ApiProperty({ example: 8, description: 'Number of rows, lettered from A' })
  @IsInt()
  @Min(1)
  @Max(26)
  rows!: number;

  @ApiProperty({ example: 12, description: 'Seats in each row' })
  @IsInt()
  @Min(1)
  @Max(40)
  seatsPerRow!: number;

  @ApiPropertyOptional({ example: ['E', 'F'], description: 'Rows priced as PREMIUM' })
  @IsOptional()
  @IsArray()
  @Matches(/^[A-Z]$/, { each: true })
  premiumRows?: string[];

  @ApiPropertyOptional({ example: ['H'], description: 'Rows priced as VIP' })
  @IsOptional()
  @IsArray()
  @Matches(/^[A-Z]$/, { each: true })
  vipRows?: string[];

  @ApiPropertyOptional({ example: ['A1', 'A2'], description: 'Wheelchair accessible seats' })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  accessibleSeats?: string[];
}
