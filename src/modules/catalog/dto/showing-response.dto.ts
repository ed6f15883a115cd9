import { ApiProperty } from '@nestjs/swagger';

export class ShowingResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  screenNumber!: number;

  @ApiProperty()
  startTime!: Date;

  @ApiProperty()
  endTime!: Date;

  @ApiProperty()
  basePrice!: number;
}
