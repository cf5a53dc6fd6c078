import pino from 'pino';

const usePretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  serializers: {
    error: pino.stdSerializers.err
  },
  redact: {
    paths: ['password', '*.password', 'imap.password'],
    censor: '[REDACTED]'
  },
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true }
        }
      }
    : {})
});

export type Logger = pino.Logger;

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
