/**
 * Leveled console logger shared by the extractors, the pipeline and the CLI
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type ConsoleWriter = (...args: unknown[]) => void;

const WRITERS: Record<LogLevel, ConsoleWriter> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger {
  private threshold: number;

  constructor(level?: string) {
    this.threshold = 0;
    this.setLevel(level ?? process.env.LOG_LEVEL ?? 'info');
  }

  /** Unknown level names fall back to info. */
  setLevel(level: string) {
    this.threshold = LOG_LEVELS.indexOf(isLogLevel(level) ? level : 'info');
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  private write(level: LogLevel, message: string, data: unknown, ...extra: unknown[]) {
    if (!this.isEnabled(level)) return;
    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
    WRITERS[level](prefix, message, data ?? '', ...extra);
  }

  debug(message: string, data?: unknown) {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown, data?: unknown) {
    this.write('error', message, data, error ?? '');
  }
}

export const logger = new Logger();
