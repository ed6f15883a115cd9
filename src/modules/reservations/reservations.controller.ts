import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ReservationsService } from './reservations.service';
import { CreateHoldDto } from './dto/create-hold.dto';
import { ExtendHoldDto } from './dto/extend-hold.dto';
import { HoldResponseDto } from './dto/hold-response.dto';
import { SeatReservation } from './entities/seat-reservation.entity';
import { seatLabel } from '@modules/catalog/entities/seat.entity';
import { CurrentUser } from '@common/decorators/current-user.decorator';
import { HoldRateLimit } from '@common/decorators/rate-limit.decorator';
import { RateLimitGuard } from '@common/guards/rate-limit.guard';
import { USER_ID_HEADER, UserIdentityGuard } from '@common/guards/user-identity.guard';

@ApiTags('holds')
@ApiHeader({ name: USER_ID_HEADER, description: 'Authenticated user id', required: true })
@Controller('holds')
@UseGuards(UserIdentityGuard, RateLimitGuard)
export class ReservationsController {
  constructor(private readonly reservationsService: ReservationsService) {}

  @Post()
  @HoldRateLimit()
  @ApiOperation({ summary: 'Hold a seat for a showing (15 minutes)' })
  @ApiResponse({ status: 201, description: 'Hold created', type: HoldResponseDto })
  @ApiResponse({ status: 400, description: 'Seat is not on the showing screen' })
  @ApiResponse({ status: 404, description: 'Showing not found' })
  @ApiResponse({ status: 409, description: 'Seat not available' })
  async create(
    @CurrentUser() userId: string,
    @Body() createHoldDto: CreateHoldDto,
  ): Promise<HoldResponseDto> {
    const hold = await this.reservationsService.createHold(userId, createHoldDto);
    return this.toResponseDto(hold);
  }

  @Get()
  @ApiOperation({ summary: 'Live holds of the caller' })
  @ApiResponse({ status: 200, type: [HoldResponseDto] })
  async findMine(@CurrentUser() userId: string): Promise<HoldResponseDto[]> {
    const holds = await this.reservationsService.findUserHolds(userId);
    return holds.map((hold) => this.toResponseDto(hold));
  }

  @Post(':id/extend')
  @HttpCode(HttpStatus.OK)
  @HoldRateLimit()
  @ApiOperation({ summary: 'Push the expiry of a live hold forward' })
  @ApiResponse({ status: 200, description: 'Hold extended', type: HoldResponseDto })
  @ApiResponse({ status: 404, description: 'Hold not found or expired' })
  async extend(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() extendHoldDto: ExtendHoldDto,
  ): Promise<HoldResponseDto> {
    const hold = await this.reservationsService.extendHold(userId, id, extendHoldDto.minutes);
    return this.toResponseDto(hold);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Release a hold' })
  @ApiResponse({ status: 204, description: 'Hold released or already gone' })
  async release(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    await this.reservationsService.releaseHold(userId, id);
  }

  private toResponseDto(hold: SeatReservation): HoldResponseDto {
    return {
      reservationId: hold.id,
      userId: hold.userId,
      showingId: hold.showingId,
      seatId: hold.seatId,
      seatLabel: hold.seat ? seatLabel(hold.seat) : undefined,
      sessionKey: hold.sessionKey,
      createdAt: hold.createdAt,
      expiresAt: hold.expiresAt,
    };
  }
}
