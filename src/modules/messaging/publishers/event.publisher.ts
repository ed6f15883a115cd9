import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import * as amqp from 'amqplib';
import { CLOCK, Clock } from '@common/clock/clock';
import { getErrorMessageString } from '@common/utils/error.util';
import { MESSAGING_CONSTANTS, QueueRoutingKey } from '../messaging.constants';
import { declareSeatingTopology } from '../amqp-setup.util';
import { BookingEvent, HoldEvent, SeatingEvent } from './event.types';

export interface HoldEventSource {
  id: string;
  userId: string;
  showingId: string;
  seatId: string;
  expiresAt: Date;
}

export interface BookingEventSource {
  id: string;
  bookingReference: string;
  userId: string;
  showingId: string;
  totalAmount: number | string;
  seats?: { seatId: string }[];
}

/**
 * Publishes seating events to a topic exchange over a confirm channel.
 * Publishing happens after the owning transaction committed and never
 * fails the request: a broker outage only costs the notification.
 */
@Injectable()
export class EventPublisher implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(EventPublisher.name);
  private connection: amqp.ChannelModel | null = null;
  private channel: amqp.ConfirmChannel | null = null;
  private isConnected = false;
  private isShuttingDown = false;
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.connect();
  }

  async onApplicationShutdown(): Promise<void> {
    this.isShuttingDown = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.connection) {
      try {
        await this.connection.close();
      } catch (error) {
        this.logger.warn(`Error closing RabbitMQ connection: ${getErrorMessageString(error)}`);
      }
    }
    this.connection = null;
    this.channel = null;
    this.isConnected = false;
  }

  private async connect(): Promise<void> {
    const url = this.configService.get<string>('rabbitmq.url');
    if (!url) {
      this.logger.warn('RabbitMQ URL not configured, messaging disabled');
      return;
    }

    try {
      this.connection = await amqp.connect(url);
      this.channel = await this.connection.createConfirmChannel();
      await declareSeatingTopology(this.channel);

      this.isConnected = true;
      this.logger.log('Connected to RabbitMQ');

      this.connection.on('error', (err: Error) => {
        this.logger.error(`RabbitMQ connection error: ${err.message}`);
        this.isConnected = false;
      });

      this.connection.on('close', () => {
        this.logger.warn('RabbitMQ connection closed');
        this.isConnected = false;
        this.scheduleReconnect();
      });
    } catch (error) {
      this.logger.error(`Failed to connect to RabbitMQ: ${getErrorMessageString(error)}`);
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown || this.reconnectTimer) {
      return;
    }
    const delay = this.configService.get<number>('rabbitmq.reconnectDelayMs') ?? 5000;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.connect();
    }, delay);
  }

  private async publish(routingKey: QueueRoutingKey, message: SeatingEvent): Promise<void> {
    if (!this.isConnected || !this.channel) {
      this.logger.warn(`Cannot publish ${routingKey}, not connected to RabbitMQ`);
      return;
    }

    try {
      this.channel.publish(
        MESSAGING_CONSTANTS.EXCHANGE_NAME,
        routingKey,
        Buffer.from(JSON.stringify(message)),
        {
          persistent: true,
          contentType: 'application/json',
          messageId: message.eventId,
          type: message.type,
          timestamp: Math.floor(this.clock.now().getTime() / 1000),
        },
      );
      await this.channel.waitForConfirms();
      this.logger.debug(`Published message to ${routingKey}: ${message.eventId}`);
    } catch (error) {
      this.logger.error(`Failed to publish ${routingKey}: ${getErrorMessageString(error)}`);
    }
  }

  async publishHoldEvent(type: HoldEvent['type'], hold: HoldEventSource): Promise<void> {
    const event: HoldEvent = {
      eventId: randomUUID(),
      type,
      holdId: hold.id,
      userId: hold.userId,
      showingId: hold.showingId,
      seatId: hold.seatId,
      expiresAt: hold.expiresAt.toISOString(),
      timestamp: this.clock.now().toISOString(),
    };
    await this.publish(type, event);
  }

  async publishBookingEvent(
    type: BookingEvent['type'],
    booking: BookingEventSource,
  ): Promise<void> {
    const event: BookingEvent = {
      eventId: randomUUID(),
      type,
      bookingId: booking.id,
      bookingReference: booking.bookingReference,
      userId: booking.userId,
      showingId: booking.showingId,
      seatIds: booking.seats?.map((seat) => seat.seatId) ?? [],
      totalAmount: Number(booking.totalAmount),
      timestamp: this.clock.now().toISOString(),
    };
    await this.publish(type, event);
  }

  async publishSeatReleased(showingId: string, seatIds: string[]): Promise<void> {
    if (seatIds.length === 0) {
      return;
    }
    await this.publish('seat.released', {
      eventId: randomUUID(),
      type: 'seat.released',
      showingId,
      seatIds,
      timestamp: this.clock.now().toISOString(),
    });
  }
}
