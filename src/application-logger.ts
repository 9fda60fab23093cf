import pino from 'pino';

export const loggerPrefix = '[Rollout]';

const defaultLevel = process.env.NODE_ENV === 'production' ? 'warn' : 'info';

export const logger = pino({
  level: process.env.ROLLOUT_LOG_LEVEL ?? defaultLevel,
  serializers: {
    err: pino.stdSerializers.err,
  },
});
