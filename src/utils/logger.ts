import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export const logger = pino({
  name: 'backtester',
  level: process.env.LOG_LEVEL || 'info',
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,name',
        },
      }
    : undefined,
  redact: {
    paths: ['apiKey', 'token', 'password', '*.apiKey', '*.token', '*.password'],
    censor: '[REDACTED]',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = pino.Logger;

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
