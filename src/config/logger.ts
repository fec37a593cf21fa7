/**
 * Pino logger
 * - Production: JSON only
 * - Development: pretty-printed with colors
 */
import pino from 'pino';
import { env } from './env.js';

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (_logger) return _logger;

  _logger = pino({
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    base: env.NODE_ENV === 'production' ? undefined : {
      service: 'cpamm-core',
      feeBps: env.AMM_FEE_BPS,
    },
  });

  return _logger;
}
