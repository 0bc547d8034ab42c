import pino from 'pino';

import { env } from '../config/index.js';

export type { Logger } from 'pino';

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true,
        destination: 2
      }
    }
  : undefined;

export const logger = pino(
  {
    level: env.LOG_LEVEL,
    base: {
      app: 'blob-vault',
      env: env.NODE_ENV
    },
    transport
  },
  transport ? undefined : pino.destination(2)
);
