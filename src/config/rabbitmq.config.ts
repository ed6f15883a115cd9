import { registerAs } from '@nestjs/config';

export const rabbitmqConfig = registerAs('rabbitmq', () => ({
  url: process.env.RABBITMQ_URL ?? '',
  reconnectDelayMs: parseInt(process.env.RABBITMQ_RECONNECT_DELAY_MS ?? '5000', 10),
}));
