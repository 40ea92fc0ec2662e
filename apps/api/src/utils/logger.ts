import pino from 'pino';
import type { Logger } from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function resolveLevel(nodeEnv: string): pino.LevelWithSilent {
  const fromEnv = LEVELS.find(level => level === process.env.LOG_LEVEL);
  if (fromEnv) return fromEnv;
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';

  return pino({
    level: resolveLevel(nodeEnv),
    base: {
      env: nodeEnv,
      service: 'travel-search-api',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss UTC',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
