import pino, { type Logger } from 'pino';
import type { LoggingConfig } from '@stepwise/shared';

export type { Logger };

/**
 * Build the process logger. With a file path the log is appended there
 * synchronously; otherwise it goes to stderr so stdout stays free for the UI.
 */
export function createLogger(config: LoggingConfig): Logger {
  const destination = config.file_path
    ? pino.destination({ dest: config.file_path, mkdir: true, sync: true })
    : pino.destination(2);

  return pino(
    {
      name: 'stepwise',
      level: config.level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

/** A logger that discards everything; the default wherever none is injected. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
