export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured context attached to a log entry. */
export type LogContext = Readonly<Record<string, unknown>>;

/** Port for structured logging. */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/** Logger that discards everything. Used when no logger is configured. */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
