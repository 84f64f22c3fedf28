import pino from 'pino';

import { LOG_LEVEL } from './config.js';

export const logger = pino(
  process.env.NODE_ENV === 'test'
    ? { level: LOG_LEVEL }
    : {
        level: LOG_LEVEL,
        transport: { target: 'pino-pretty', options: { colorize: true } },
      },
);
