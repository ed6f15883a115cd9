export const MESSAGING_CONSTANTS = {
  EXCHANGE_NAME: 'seating.events',
  DEAD_LETTER_EXCHANGE: 'seating.dlx',
  DLQ_NAME: 'seating.dlq',
  // Unconsumed events are dead-lettered after a week.
  EVENT_TTL_MS: 7 * 24 * 60 * 60 * 1000,
} as const;

export const QUEUE_CONFIGS = [
  { name: 'seating.hold.created', routingKey: 'hold.created' },
  { name: 'seating.hold.released', routingKey: 'hold.released' },
  { name: 'seating.hold.expired', routingKey: 'hold.expired' },
  { name: 'seating.booking.created', routingKey: 'booking.created' },
  { name: 'seating.booking.confirmed', routingKey: 'booking.confirmed' },
  { name: 'seating.booking.cancelled', routingKey: 'booking.cancelled' },
  { name: 'seating.booking.expired', routingKey: 'booking.expired' },
  { name: 'seating.seat.released', routingKey: 'seat.released' },
] as const;

export type QueueRoutingKey = (typeof QUEUE_CONFIGS)[number]['routingKey'];
