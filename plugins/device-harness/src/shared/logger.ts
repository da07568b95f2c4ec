import pino from 'pino';
import type { Logger } from 'pino';

export const logger = pino({
  name: 'device-harness',
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 2 } }
      : undefined,
});

export type { Logger };

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
