import type { LogContext, LogLevel, Logger } from '../../domain/ports/Logger.js';

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped. Default: `'info'`. */
  readonly minLevel?: LogLevel;
  /** `'json'` writes one JSON object per line; `'pretty'` writes `[level] message {context}`. Default: `'pretty'`. */
  readonly format?: 'json' | 'pretty';
  /** Fields added to every entry, e.g. `{ service: 'ingest' }`. */
  readonly context?: LogContext;
}

/** Logger writing to the console. `warn` and `error` go to stderr. */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly baseContext: LogContext;

  constructor(options?: ConsoleLoggerOptions) {
    this.minLevel = options?.minLevel ?? 'info';
    this.format = options?.format ?? 'pretty';
    this.baseContext = options?.context ?? {};
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /** Logger that adds `context` to every entry of this one. */
  child(context: LogContext): ConsoleLogger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      format: this.format,
      context: { ...this.baseContext, ...context },
    });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const fields = { ...this.baseContext, ...context };
    const line =
      this.format === 'json'
        ? JSON.stringify({ level, message, timestamp: new Date().toISOString(), ...fields })
        : `[${level}] ${message}${Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : ''}`;

    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
