import pino from 'pino';
import { config } from '@config/app.config.js';

export const logger = pino({
  level: config.LOG_LEVEL ?? (config.isDevelopment ? 'debug' : 'info'),
  transport: config.isDevelopment
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
  redact: [
    'req.headers.authorization',
    'password',
    'token',
    'store_passwd',
    '*.store_passwd',
    'storePassword',
  ],
});
