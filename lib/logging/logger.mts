/**
 * Scoped console logger
 *
 * Every line is prefixed with the module scope, e.g.
 * `[ConnectionManager] Connected to ws://localhost:8081`.
 * Structured data is appended as JSON.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Logger function signature (defaults to the console method for the level) */
export type LoggerFunction = (...args: unknown[]) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives every emitted line instead of the console */
  sink?: LoggerFunction;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const CONSOLE_METHODS: Record<Exclude<LogLevel, 'silent'>, LoggerFunction> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

let defaultOptions: Required<Pick<LoggerOptions, 'level'>> & LoggerOptions = {
  level: 'info',
};

/**
 * Change the level and sink used by loggers created without explicit options
 */
export function configureLogging(options: LoggerOptions): void {
  defaultOptions = { ...defaultOptions, ...options };
}

export function formatLine(scope: string, msg: string, data?: Record<string, unknown>): string {
  return data ? `[${scope}] ${msg} ${JSON.stringify(data)}` : `[${scope}] ${msg}`;
}

export function createLogger(scope: string, options?: LoggerOptions): Logger {
  const resolve = (): LoggerOptions => options ?? defaultOptions;

  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string, data?: Record<string, unknown>) => {
    const { level: threshold = 'info', sink } = resolve();
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const line = formatLine(scope, msg, data);
    (sink ?? CONSOLE_METHODS[level])(line);
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
    child: (childScope) => createLogger(`${scope}:${childScope}`, options),
  };
}
