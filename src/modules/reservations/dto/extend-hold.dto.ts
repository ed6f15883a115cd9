import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class ExtendHoldDto {
  @ApiPropertyOptional({ example: 15, minimum: 1, maximum: 15, default: 15 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(15)
  minutes?: number;
}
