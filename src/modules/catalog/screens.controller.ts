import { Controller, Get, Post, Body, Param, ParseIntPipe, UseGuards } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { CatalogService } from './catalog.service';
import { CreateSeatLayoutDto } from './dto/create-seat-layout.dto';
import { SeatResponseDto } from './dto/seat-response.dto';
import { toSeatResponse } from './catalog.mapper';
import { RateLimitGuard } from '@common/guards/rate-limit.guard';

@ApiTags('screens')
@Controller('screens')
@UseGuards(RateLimitGuard)
export class ScreensController {
  constructor(private readonly catalogService: CatalogService) {}

  @Post(':screenNumber/seats')
  @ApiOperation({ summary: 'Generate the seat layout of a screen' })
  @ApiResponse({ status: 201, description: 'Seats created', type: [SeatResponseDto] })
  @ApiResponse({ status: 409, description: 'Screen already has seats' })
  async createLayout(
    @Param('screenNumber', ParseIntPipe) screenNumber: number,
    @Body() dto: CreateSeatLayoutDto,
  ): Promise<SeatResponseDto[]> {
    const seats = await this.catalogService.createSeatLayout(screenNumber, dto);
    return seats.map(toSeatResponse);
  }

  @Get(':screenNumber/seats')
  @ApiOperation({ summary: 'List the seats of a screen' })
  @ApiResponse({ status: 200, description: 'Seats of the screen', type: [SeatResponseDto] })
  async findSeats(
    @Param('screenNumber', ParseIntPipe) screenNumber: number,
  ): Promise<SeatResponseDto[]> {
    const seats = await this.catalogService.findScreenSeats(screenNumber);
    return seats.map(toSeatResponse);
  }
}
