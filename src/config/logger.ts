import pino, { LoggerOptions } from 'pino';

const options: LoggerOptions =
  process.env.NODE_ENV === 'test'
    ? { level: process.env.LOG_LEVEL || 'silent' }
    : process.env.NODE_ENV !== 'production'
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'SYS:dd-mm-yyyy HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
        level: process.env.LOG_LEVEL || 'debug',
      }
    : {
        // JSON lines in production; shipping them is someone else's job.
        level: process.env.LOG_LEVEL || 'info',
        base: { service: process.env.SERVICE_NAME || 'sandboxed-thumbnailer' },
      };

export const logger = pino(options);
