import pino from 'pino';
import { config } from './config.js';

const isDev = config.nodeEnv !== 'production' && config.nodeEnv !== 'test';

export const logger = pino({
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          singleLine: true,
        },
      }
    : undefined,
  level: config.logLevel,
});

export type { Logger } from 'pino';
