import { pino, type Logger } from 'pino';
import { config, serverConfig } from '../config/index.js';

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: 'movie-favorites-api' },
  ...(serverConfig.isDevelopment && {
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' },
    },
  }),
});

export type { Logger };

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
