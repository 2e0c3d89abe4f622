import { pino, type Logger } from 'pino';

import type { CatalogConfig } from './config.js';

export type { Logger };

export function createLogger(config: Pick<CatalogConfig, 'logLevel' | 'name' | 'prettyLogs'>): Logger {
  return pino({
    level: config.logLevel,
    name: config.name,
    ...(config.prettyLogs && {
      transport: {
        options: {
          colorize: true,
        },
        target: 'pino-pretty',
      },
    }),
  });
}

/** Logger that discards everything. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
