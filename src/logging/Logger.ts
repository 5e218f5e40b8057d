/**
 * Logger - Leveled console logging passed explicitly to each component.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger whose messages are tagged with a component name */
  child(component: string): Logger;
}

/** Where log lines go; `console` satisfies it */
export interface LogSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as string[]).includes(value);
}

export function createLogger(
  level: LogLevel = 'info',
  sink: LogSink = console,
  component?: string
): Logger {
  const threshold = SEVERITY[level];
  const tag = component ? `[fillmark:${component}]` : '[fillmark]';

  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]) => {
    if (SEVERITY[at] < threshold) return;
    sink[at](`${tag} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
    child: (name) => createLogger(level, sink, component ? `${component}:${name}` : name),
  };
}

/** Logger that drops everything (tests, library use) */
export function createSilentLogger(): Logger {
  return createLogger('silent');
}
