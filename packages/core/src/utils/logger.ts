import { type Logger, pino } from 'pino';

/** Logger used when the caller supplies none. */
export function resolveLogger(logger?: Logger): Logger {
  return logger ?? pino({ level: 'silent' });
}
