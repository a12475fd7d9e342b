import { destination, pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** 0 → warn, 1 → info, 2+ → debug. */
  verbosity?: number;
  silent?: boolean;
}

export function levelForVerbosity(verbosity: number): 'warn' | 'info' | 'debug' {
  if (verbosity <= 0) return 'warn';
  if (verbosity === 1) return 'info';
  return 'debug';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.silent ? 'silent' : levelForVerbosity(options.verbosity ?? 0);
  return pino({ name: 'dbatlas', level }, destination(2));
}
