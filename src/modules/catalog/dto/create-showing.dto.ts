import { ApiProperty } from '@nestjs/swagger';
import { IsString, IsNumber, IsDateString, IsInt, IsPositive, Length, Min } from 'class-validator';

export class CreateShowingDto {
  @ApiProperty({ example: 'The Grand Budapest Hotel', description: 'Movie title' })
  @IsString()
  @Length(1, 255)
  movieTitle!: string;

  @ApiProperty({ example: 3, description: 'Screen number' })
  @IsInt()
  @Min(1)
  screenNumber!: number;

  @ApiProperty({ example: '2026-11-20T19:00:00Z', description: 'Showing start time' })
  @IsDateString()
  startTime!: string;

  @ApiProperty({ example: '2026-11-20T21:00:00Z', description: 'Showing end time' })
  @IsDateString()
  endTime!: string;

  @ApiProperty({ example: 12.5, description: 'Base ticket price' })
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  basePrice!: number;
}
