import { destination, pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggerOptions = {
  level?: LogLevel;
  /** Append to this file instead of stderr (stdout belongs to the rendered sections). */
  file?: string;
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const base = { name: 'inboxdeck', level: opts.level ?? 'warn' };

  if (opts.file) {
    return pino(base, destination({ dest: opts.file, mkdir: true, sync: true }));
  }

  return pino(base, destination(2));
}

/** Default for library components; callers pass a real logger in. */
export const silentLogger: Logger = pino({ level: 'silent' });
