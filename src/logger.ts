import { config, type LogLevel } from './config.js';

type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Structured logger writing one JSON object per line to the console.
 * Child loggers carry a fixed context (usually the component name) on every line.
 */
export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly baseContext: LogContext = {},
  ) {}

  debug = (message: string, context?: LogContext): void => {
    this.emit('debug', message, context);
  };

  info = (message: string, context?: LogContext): void => {
    this.emit('info', message, context);
  };

  warn = (message: string, context?: LogContext): void => {
    this.emit('warn', message, context);
  };

  error = (message: string, error?: unknown, context?: LogContext): void => {
    const details = error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error === undefined ? {} : { error: String(error) };
    this.emit('error', message, { ...context, ...details });
  };

  child = (context: LogContext): Logger => {
    return new Logger(this.minLevel, { ...this.baseContext, ...context });
  };

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      env: config.env,
      ...this.baseContext,
      ...context,
    });

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger(config.logLevel);
