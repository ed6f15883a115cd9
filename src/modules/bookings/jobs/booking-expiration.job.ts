import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { getErrorMessageString } from '@common/utils/error.util';
import { BookingsService } from '../bookings.service';

@Injectable()
export class BookingExpirationJob {
  private readonly logger = new Logger(BookingExpirationJob.name);
  private isProcessing = false;

  constructor(private readonly bookingsService: BookingsService) {}

  @Cron(CronExpression.EVERY_10_SECONDS)
  async handle(): Promise<void> {
    if (this.isProcessing) {
      this.logger.debug('Booking expiration already running, skipping...');
      return;
    }

    this.isProcessing = true;

    try {
      const expiredCount = await this.bookingsService.expirePendingBookings();

      if (expiredCount > 0) {
        this.logger.log(`Expired ${expiredCount} pending booking(s)`);
      }
    } catch (error) {
      this.logger.error(`Error expiring bookings: ${getErrorMessageString(error)}`);
    } finally {
      this.isProcessing = false;
    }
  }
}
