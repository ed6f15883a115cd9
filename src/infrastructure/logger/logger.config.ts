import { join } from 'path';
import { WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const formatValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (value instanceof Error) {
    return value.message;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return '';
  }
};

export const consoleLineFormat = printf((info) => {
  const ctxValue = formatValue(info.context);
  const ctx = ctxValue ? `[${ctxValue}]` : '';
  const stackValue = formatValue(info.stack);
  const stackTrace = stackValue ? `\n${stackValue}` : '';
  return `${formatValue(info.timestamp)} ${info.level} ${ctx} ${formatValue(info.message)}${stackTrace}`.trim();
});

export interface LoggerSettings {
  nodeEnv: string;
  logDir: string;
}

export function createWinstonConfig({ nodeEnv, logDir }: LoggerSettings): WinstonModuleOptions {
  const fileFormat = combine(timestamp(), errors({ stack: true }), json());

  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: nodeEnv === 'production' ? 'info' : 'debug',
      format: combine(
        colorize({ all: nodeEnv !== 'production' }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        consoleLineFormat,
      ),
    }),
  ];

  if (nodeEnv !== 'test') {
    transports.push(
      new winston.transports.File({
        filename: join(logDir, 'error.log'),
        level: 'error',
        format: fileFormat,
      }),
      new winston.transports.File({ filename: join(logDir, 'combined.log'), format: fileFormat }),
    );
  }

  return { transports };
}
