/**
 * ロギングユーティリティ
 */

import pino from 'pino';
import { env } from '../config/env.js';

function defaultLevel(): string {
  switch (env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

export const logger = pino({
  level: env.LOG_LEVEL ?? defaultLevel(),
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = typeof logger;
