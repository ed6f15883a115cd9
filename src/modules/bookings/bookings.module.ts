import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Booking } from './entities/booking.entity';
import { BookedSeat } from './entities/booked-seat.entity';
import { BookingHistory } from './entities/booking-history.entity';
import { BookingsController } from './bookings.controller';
import { BookingsService } from './bookings.service';
import { BookingExpirationJob } from './jobs/booking-expiration.job';
import { CatalogModule } from '@modules/catalog/catalog.module';
import { AvailabilityModule } from '@modules/availability/availability.module';
import { MessagingModule } from '@modules/messaging/messaging.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Booking, BookedSeat, BookingHistory]),
    CatalogModule,
    AvailabilityModule,
    MessagingModule,
  ],
  controllers: [BookingsController],
  providers: [BookingsService, BookingExpirationJob],
  exports: [BookingsService],
})
export class BookingsModule {}
