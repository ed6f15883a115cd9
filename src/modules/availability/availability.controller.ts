import { Controller, Get, Param, ParseUUIDPipe, UseGuards } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AvailabilityService } from './availability.service';
import { SeatAvailabilityResponseDto } from './dto/seat-availability-response.dto';
import { RateLimitGuard } from '@common/guards/rate-limit.guard';

@ApiTags('showings')
@Controller('showings')
@UseGuards(RateLimitGuard)
export class AvailabilityController {
  constructor(private readonly availabilityService: AvailabilityService) {}

  @Get(':id/availability')
  @ApiOperation({ summary: 'Seats that can currently be held or booked for a showing' })
  @ApiResponse({ status: 200, description: 'Seat availability', type: SeatAvailabilityResponseDto })
  @ApiResponse({ status: 404, description: 'Showing not found' })
  async getAvailability(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<SeatAvailabilityResponseDto> {
    return this.availabilityService.getAvailability(id);
  }
}
