import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  level: LevelWithSilent;
  /** File descriptor to write to. Defaults to stderr so stdout stays free for answers. */
  fd?: number;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: 'manifold',
      level: options.level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(options.fd ?? 2)
  );
}
