import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { BookingsService } from './bookings.service';
import { CreateBookingDto } from './dto/create-booking.dto';
import { ConfirmBookingDto } from './dto/confirm-booking.dto';
import { CancelBookingDto } from './dto/cancel-booking.dto';
import { BookingResponseDto } from './dto/booking-response.dto';
import { BookingHistoryResponseDto } from './dto/booking-history-response.dto';
import { toBookingResponse, toHistoryResponse } from './bookings.mapper';
import { CLOCK, Clock } from '@common/clock/clock';
import { CurrentUser } from '@common/decorators/current-user.decorator';
import { CheckoutRateLimit } from '@common/decorators/rate-limit.decorator';
import { RateLimitGuard } from '@common/guards/rate-limit.guard';
import { USER_ID_HEADER, UserIdentityGuard } from '@common/guards/user-identity.guard';

@ApiTags('bookings')
@ApiHeader({ name: USER_ID_HEADER, description: 'Authenticated user id', required: true })
@Controller('bookings')
@UseGuards(UserIdentityGuard, RateLimitGuard)
export class BookingsController {
  constructor(
    private readonly bookingsService: BookingsService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Post()
  @CheckoutRateLimit()
  @ApiOperation({ summary: 'Book seats for a showing (pending payment for 15 minutes)' })
  @ApiResponse({ status: 201, description: 'Booking created', type: BookingResponseDto })
  @ApiResponse({ status: 400, description: 'Seats missing or not on the showing screen' })
  @ApiResponse({ status: 404, description: 'Showing not found' })
  @ApiResponse({ status: 409, description: 'One or more seats not available' })
  async create(
    @CurrentUser() userId: string,
    @Body() createBookingDto: CreateBookingDto,
  ): Promise<BookingResponseDto> {
    const booking = await this.bookingsService.createBooking(userId, createBookingDto);
    return toBookingResponse(booking, this.clock.now());
  }

  @Get()
  @ApiOperation({ summary: 'Bookings of the caller, newest first' })
  @ApiResponse({ status: 200, type: [BookingResponseDto] })
  async findMine(@CurrentUser() userId: string): Promise<BookingResponseDto[]> {
    const bookings = await this.bookingsService.findUserBookings(userId);
    const now = this.clock.now();
    return bookings.map((booking) => toBookingResponse(booking, now));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get booking by ID' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  async findOne(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<BookingResponseDto> {
    const booking = await this.bookingsService.findById(userId, id);
    return toBookingResponse(booking, this.clock.now());
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Audit trail of a booking' })
  @ApiResponse({ status: 200, type: [BookingHistoryResponseDto] })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  async history(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<BookingHistoryResponseDto[]> {
    const entries = await this.bookingsService.getHistory(userId, id);
    return entries.map(toHistoryResponse);
  }

  @Post(':id/confirm')
  @HttpCode(HttpStatus.OK)
  @CheckoutRateLimit()
  @ApiOperation({ summary: 'Record payment for a pending booking' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  @ApiResponse({ status: 409, description: 'Booking expired or not pending' })
  async confirm(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() confirmBookingDto: ConfirmBookingDto,
  ): Promise<BookingResponseDto> {
    const booking = await this.bookingsService.confirmBooking(userId, id, confirmBookingDto);
    return toBookingResponse(booking, this.clock.now());
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @CheckoutRateLimit()
  @ApiOperation({ summary: 'Cancel a confirmed booking before the showing starts' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  @ApiResponse({ status: 409, description: 'Booking cannot be cancelled' })
  async cancel(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() cancelBookingDto: CancelBookingDto,
  ): Promise<BookingResponseDto> {
    const booking = await this.bookingsService.cancelBooking(userId, id, cancelBookingDto.reason);
    return toBookingResponse(booking, this.clock.now());
  }

  @Post(':id/abandon')
  @HttpCode(HttpStatus.OK)
  @CheckoutRateLimit()
  @ApiOperation({ summary: 'Give up a pending booking and free its seats' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  @ApiResponse({ status: 409, description: 'Booking expired or not pending' })
  async abandon(
    @CurrentUser() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<BookingResponseDto> {
    const booking = await this.bookingsService.abandonBooking(userId, id);
    return toBookingResponse(booking, this.clock.now());
  }
}
