import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  name: 'pagecast',
  level: config.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(config.logPretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname' },
        },
      }
    : {}),
});
