import pino from 'pino';
import type { BaseLogger, LevelWithSilent, Logger as PinoLogger } from 'pino';

/** Subset of pino's logger the core components write to. */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): PinoLogger {
  return pino({
    name: options.name ?? 'rulepath',
    level: options.level ?? 'info',
  });
}

/** Logger used when a component is constructed without one. */
export const silentLogger: Logger = pino({ level: 'silent' });
