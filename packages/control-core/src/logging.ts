// ---------------------------------------------------------------------------
// Structured logging (pino, JSON lines)
// ---------------------------------------------------------------------------

import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;
export type LogDestination = pino.DestinationStream;

export interface LoggerOptions {
  /** Minimum level written. Defaults to `info`. */
  level?: LogLevel;
  /** Where JSON lines go. Defaults to a synchronous stdout destination. */
  destination?: LogDestination;
}

/** Create a named logger. No global logger exists; callers inject the one they build. */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const destination = options.destination ?? pino.destination({ dest: 1, sync: true });
  return pino({ name, level: options.level ?? 'info' }, destination);
}
