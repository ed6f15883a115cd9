import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { MESSAGING_CONSTANTS, QUEUE_CONFIGS } from '@modules/messaging/messaging.constants';
import { CLOCK } from '@common/clock/clock';
import { TestClock } from '../../../../support/test-clock';

jest.mock('amqplib', () => ({
  connect: jest.fn(),
}));

import * as amqp from 'amqplib';

interface EventMessage {
  type: string;
  eventId: string;
  timestamp: string;
  holdId?: string;
  bookingId?: string;
  bookingReference?: string;
  showingId?: string;
  seatId?: string;
  seatIds?: string[];
  totalAmount?: number;
  expiresAt?: string;
}

describe('EventPublisher', () => {
  let publisher: EventPublisher;
  let settings: Record<string, unknown>;
  let clock: TestClock;
  let mockChannel: {
    assertExchange: jest.Mock;
    assertQueue: jest.Mock;
    bindQueue: jest.Mock;
    publish: jest.Mock;
    waitForConfirms: jest.Mock;
  };
  let mockConnection: {
    createConfirmChannel: jest.Mock;
    on: jest.Mock;
    close: jest.Mock;
  };

  const publishedMessage = (index = 0): { routingKey: string; message: EventMessage } => {
    const [exchange, routingKey, buffer] = mockChannel.publish.mock.calls[index] as [
      string,
      string,
      Buffer,
      object,
    ];
    expect(exchange).toBe('seating.events');
    return { routingKey, message: JSON.parse(buffer.toString()) as EventMessage };
  };

  beforeEach(async () => {
    mockChannel = {
      assertExchange: jest.fn().mockResolvedValue(undefined),
      assertQueue: jest.fn().mockResolvedValue(undefined),
      bindQueue: jest.fn().mockResolvedValue(undefined),
      publish: jest.fn().mockReturnValue(true),
      waitForConfirms: jest.fn().mockResolvedValue(undefined),
    };

    mockConnection = {
      createConfirmChannel: jest.fn().mockResolvedValue(mockChannel),
      on: jest.fn(),
      close: jest.fn().mockResolvedValue(undefined),
    };

    (amqp.connect as jest.Mock).mockResolvedValue(mockConnection);

    settings = { 'rabbitmq.url': 'amqp://localhost', 'rabbitmq.reconnectDelayMs': 5000 };
    clock = new TestClock('2026-03-01T10:00:00.000Z');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventPublisher,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => settings[key]),
          },
        },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile();

    publisher = module.get<EventPublisher>(EventPublisher);
  });

  afterEach(async () => {
    await publisher.onApplicationShutdown();
    jest.clearAllMocks();
  });

  describe('onModuleInit', () => {
    it('should connect and declare the seating topology', async () => {
      await publisher.onModuleInit();

      expect(amqp.connect).toHaveBeenCalledWith('amqp://localhost');
      expect(mockConnection.createConfirmChannel).toHaveBeenCalled();
      expect(mockChannel.assertExchange).toHaveBeenCalledWith('seating.events', 'topic', {
        durable: true,
      });
      expect(mockChannel.assertQueue).toHaveBeenCalledWith('seating.dlq', { durable: true });
      expect(mockChannel.bindQueue).toHaveBeenCalledTimes(QUEUE_CONFIGS.length + 1);
      expect(mockChannel.bindQueue).toHaveBeenCalledWith(
        'seating.hold.created',
        MESSAGING_CONSTANTS.EXCHANGE_NAME,
        'hold.created',
      );
    });

    it('should dead-letter every event queue', async () => {
      await publisher.onModuleInit();

      expect(mockChannel.assertExchange).toHaveBeenCalledWith('seating.dlx', 'fanout', {
        durable: true,
      });
      expect(mockChannel.bindQueue).toHaveBeenCalledWith('seating.dlq', 'seating.dlx', '');
      expect(mockChannel.assertQueue).toHaveBeenCalledWith('seating.booking.expired', {
        durable: true,
        deadLetterExchange: 'seating.dlx',
        messageTtl: 604800000,
      });
    });

    it('should not connect when URL is not configured', async () => {
      settings['rabbitmq.url'] = '';

      await publisher.onModuleInit();

      expect(amqp.connect).not.toHaveBeenCalled();
    });

    it('should schedule a reconnect after a failed connection', async () => {
      jest.useFakeTimers();
      (amqp.connect as jest.Mock).mockRejectedValueOnce(new Error('Connection failed'));

      await publisher.onModuleInit();
      expect(amqp.connect).toHaveBeenCalledTimes(1);

      jest.advanceTimersByTime(5000);
      expect(amqp.connect).toHaveBeenCalledTimes(2);

      jest.useRealTimers();
    });
  });

  describe('publishHoldEvent', () => {
    it('should publish the hold with its expiry', async () => {
      await publisher.onModuleInit();

      await publisher.publishHoldEvent('hold.created', {
        id: 'hold-1',
        userId: 'user-1',
        showingId: 'showing-1',
        seatId: 'seat-1',
        expiresAt: new Date('2026-03-01T10:15:00.000Z'),
      });

      const { routingKey, message } = publishedMessage();
      expect(routingKey).toBe('hold.created');
      expect(message).toEqual({
        eventId: expect.any(String) as string,
        type: 'hold.created',
        holdId: 'hold-1',
        userId: 'user-1',
        showingId: 'showing-1',
        seatId: 'seat-1',
        expiresAt: '2026-03-01T10:15:00.000Z',
        timestamp: '2026-03-01T10:00:00.000Z',
      });
      expect(mockChannel.waitForConfirms).toHaveBeenCalled();
    });

    it('should mark messages persistent and typed', async () => {
      await publisher.onModuleInit();

      await publisher.publishHoldEvent('hold.released', {
        id: 'hold-1',
        userId: 'user-1',
        showingId: 'showing-1',
        seatId: 'seat-1',
        expiresAt: new Date('2026-03-01T10:15:00.000Z'),
      });

      const options = (mockChannel.publish.mock.calls[0] as [string, string, Buffer, object])[3];
      expect(options).toEqual(
        expect.objectContaining({
          persistent: true,
          contentType: 'application/json',
          type: 'hold.released',
          timestamp: Math.floor(Date.parse('2026-03-01T10:00:00.000Z') / 1000),
        }),
      );
    });
  });

  describe('publishBookingEvent', () => {
    it('should publish seat ids and a numeric total', async () => {
      await publisher.onModuleInit();

      await publisher.publishBookingEvent('booking.created', {
        id: 'booking-1',
        bookingReference: 'BK-000000000001',
        userId: 'user-1',
        showingId: 'showing-1',
        totalAmount: '25.00',
        seats: [{ seatId: 'seat-1' }, { seatId: 'seat-2' }],
      });

      const { routingKey, message } = publishedMessage();
      expect(routingKey).toBe('booking.created');
      expect(message.bookingId).toBe('booking-1');
      expect(message.bookingReference).toBe('BK-000000000001');
      expect(message.seatIds).toEqual(['seat-1', 'seat-2']);
      expect(message.totalAmount).toBe(25);
    });

    it('should publish an empty seat list when seats are not loaded', async () => {
      await publisher.onModuleInit();

      await publisher.publishBookingEvent('booking.expired', {
        id: 'booking-1',
        bookingReference: 'BK-000000000001',
        userId: 'user-1',
        showingId: 'showing-1',
        totalAmount: 10,
      });

      expect(publishedMessage().message.seatIds).toEqual([]);
    });
  });

  describe('publishSeatReleased', () => {
    it('should publish released seats of a showing', async () => {
      await publisher.onModuleInit();

      await publisher.publishSeatReleased('showing-1', ['seat-1']);

      const { routingKey, message } = publishedMessage();
      expect(routingKey).toBe('seat.released');
      expect(message.showingId).toBe('showing-1');
      expect(message.seatIds).toEqual(['seat-1']);
    });

    it('should skip an empty release', async () => {
      await publisher.onModuleInit();

      await publisher.publishSeatReleased('showing-1', []);

      expect(mockChannel.publish).not.toHaveBeenCalled();
    });
  });

  describe('when not connected', () => {
    it('should drop events without throwing', async () => {
      await expect(
        publisher.publishSeatReleased('showing-1', ['seat-1']),
      ).resolves.toBeUndefined();

      expect(mockChannel.publish).not.toHaveBeenCalled();
    });

    it('should swallow broker confirmation failures', async () => {
      await publisher.onModuleInit();
      mockChannel.waitForConfirms.mockRejectedValue(new Error('nack'));

      await expect(
        publisher.publishSeatReleased('showing-1', ['seat-1']),
      ).resolves.toBeUndefined();
    });
  });

  describe('onApplicationShutdown', () => {
    it('should close the connection', async () => {
      await publisher.onModuleInit();

      await publisher.onApplicationShutdown();

      expect(mockConnection.close).toHaveBeenCalled();
    });
  });
});
