import pino from 'pino';
import type { Config } from './config/index.js';

export interface LogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

/**
 * Minimal logger surface the services depend on. Matches pino so the root
 * logger can be passed straight through, and tests can hand in a stub.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child(bindings: Record<string, unknown>): Logger;
}

export function createLogger(config: Pick<Config, 'logLevel' | 'prettyLogs'>): pino.Logger {
  return pino({
    level: config.logLevel,
    base: { service: 'chat-reminders' },
    transport: config.prettyLogs
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}
