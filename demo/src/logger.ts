import { pino, type Logger } from 'pino';
import type { DemoConfig } from './config.js';

/**
 * Demo logger writing to stderr so stdout only carries the tree output
 * Development runs get pino-pretty, everything else JSON lines
 */
export function createLogger(config: Pick<DemoConfig, 'logLevel' | 'prettyLogs'>): Logger {
  if (config.prettyLogs) {
    return pino({
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2 }
      }
    });
  }
  return pino({ level: config.logLevel }, pino.destination(2));
}
