import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { getErrorMessageString } from '@common/utils/error.util';
import { ReservationsService } from '../reservations.service';

@Injectable()
export class HoldExpirationJob {
  private readonly logger = new Logger(HoldExpirationJob.name);
  private isProcessing = false;

  constructor(private readonly reservationsService: ReservationsService) {}

  @Cron(CronExpression.EVERY_10_SECONDS)
  async handle(): Promise<void> {
    if (this.isProcessing) {
      this.logger.debug('Hold sweep already running, skipping...');
      return;
    }

    this.isProcessing = true;

    try {
      const expiredCount = await this.reservationsService.expireHolds();

      if (expiredCount > 0) {
        this.logger.log(`Removed ${expiredCount} expired hold(s)`);
      }
    } catch (error) {
      this.logger.error(`Error expiring holds: ${getErrorMessageString(error)}`);
    } finally {
      this.isProcessing = false;
    }
  }
}
