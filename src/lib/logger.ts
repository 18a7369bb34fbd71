/**
 * Diagnostic logging as JSON lines on stderr.
 *
 * stdout is reserved for result records, so every log line goes to stderr.
 * Lines below the configured level are dropped.
 *
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogFields = Record<string, string | number | boolean | undefined>;

export class Logger {
  private threshold: number;

  constructor(level: LogLevel | 'silent' = 'info') {
    this.threshold = level === 'silent' ? Infinity : LEVEL_ORDER[level];
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields = {}): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const line = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...fields,
    };
    process.stderr.write(JSON.stringify(line) + '\n');
  }
}

/** Logger that drops everything; the default wherever one is optional. */
export const silentLogger = new Logger('silent');
