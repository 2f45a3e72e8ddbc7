/* eslint-disable no-console */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Emitting = Exclude<LogLevel, 'silent'>;

function format(scope: string, level: Emitting, message: string, context?: LogContext): string {
  const line = `${new Date().toISOString()} - ${scope} - ${level.toUpperCase()} - ${message}`;
  return context && Object.keys(context).length > 0 ? `${line} ${JSON.stringify(context)}` : line;
}

/**
 * Console logger. Lines look like
 * `2026-01-01T10:00:00.000Z - bookings - INFO - [BOOKING_SUCCESS] ... {"bookingId":"..."}`.
 */
export function createLogger(scope: string, level: LogLevel): Logger {
  const threshold = SEVERITY[level];

  function emit(at: Emitting, message: string, context?: LogContext): void {
    if (SEVERITY[at] < threshold) return;
    const line = format(scope, at, message, context);
    if (at === 'error') console.error(line);
    else if (at === 'warn') console.warn(line);
    else console.log(line);
  }

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child: childScope => createLogger(`${scope}.${childScope}`, level),
  };
}
