import * as amqp from 'amqplib';
import { MESSAGING_CONSTANTS, QUEUE_CONFIGS } from './messaging.constants';

/**
 * Declares the seating exchange, one durable queue per event type and the
 * dead-letter path shared by all of them. Safe to run on every connect.
 */
export async function declareSeatingTopology(channel: amqp.ConfirmChannel): Promise<void> {
  const { EXCHANGE_NAME, DEAD_LETTER_EXCHANGE, DLQ_NAME, EVENT_TTL_MS } = MESSAGING_CONSTANTS;

  await channel.assertExchange(EXCHANGE_NAME, 'topic', { durable: true });
  await channel.assertExchange(DEAD_LETTER_EXCHANGE, 'fanout', { durable: true });

  await channel.assertQueue(DLQ_NAME, { durable: true });
  await channel.bindQueue(DLQ_NAME, DEAD_LETTER_EXCHANGE, '');

  await Promise.all(
    QUEUE_CONFIGS.map(async ({ name, routingKey }) => {
      await channel.assertQueue(name, {
        durable: true,
        deadLetterExchange: DEAD_LETTER_EXCHANGE,
        messageTtl: EVENT_TTL_MS,
      });
      await channel.bindQueue(name, EXCHANGE_NAME, routingKey);
    }),
  );
}
