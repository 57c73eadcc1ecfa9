import pino, { type Logger } from 'pino';

import { env } from '@/shared/config/env.js';

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'gif-stroke-encoder', env: env.NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
