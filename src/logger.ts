import { env } from 'node:process';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

const emit = (write: (...args: unknown[]) => void, level: string, message: string, context?: LogContext): void => {
  if (context === undefined) {
    write(`[${level}]`, message);
    return;
  }
  write(`[${level}]`, message, context);
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const debugEnabled = options.debug ?? Boolean(env.DEBUG);
  return {
    debug: (message, context) => {
      if (debugEnabled) {
        emit(console.debug, 'debug', message, context);
      }
    },
    info: (message, context) => emit(console.info, 'info', message, context),
    warn: (message, context) => emit(console.warn, 'warn', message, context),
    error: (message, context) => emit(console.error, 'error', message, context),
  };
};

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
