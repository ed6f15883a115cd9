import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SeatReservation } from './entities/seat-reservation.entity';
import { ReservationsController } from './reservations.controller';
import { ReservationsService } from './reservations.service';
import { HoldExpirationJob } from './jobs/hold-expiration.job';
import { CatalogModule } from '@modules/catalog/catalog.module';
import { AvailabilityModule } from '@modules/availability/availability.module';
import { MessagingModule } from '@modules/messaging/messaging.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([SeatReservation]),
    CatalogModule,
    AvailabilityModule,
    MessagingModule,
  ],
  controllers: [ReservationsController],
  providers: [ReservationsService, HoldExpirationJob],
  exports: [ReservationsService],
})
export class ReservationsModule {}
