import { createWriteStream, type WriteStream } from 'fs';

/**
 * Run logger
 *
 * Timestamped `[source]` lines on the console, appended to a log file (no rotation).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(source: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  filePath?: string | null;
  source?: string;
  /** Console sink, swapped out in tests */
  write?: (level: LogLevel, line: string) => void;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatLine(level: LogLevel, source: string, message: string, now = new Date()): string {
  return `${formatTime(now)} - ${level.toUpperCase()} - [${source}] ${message}`;
}

function consoleWrite(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class RunLogger implements Logger {
  constructor(
    private readonly source: string,
    private readonly level: LogLevel,
    private readonly write: (level: LogLevel, line: string) => void,
    private readonly file: WriteStream | null
  ) {}

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  child(source: string): Logger {
    return new RunLogger(source, this.level, this.write, this.file);
  }

  /**
   * Flush and close the log file. Child loggers share the stream.
   */
  close(): Promise<void> {
    const file = this.file;
    if (!file || file.closed || file.destroyed) return Promise.resolve();
    return new Promise(resolve => file.end(() => resolve()));
  }

  private log(level: LogLevel, message: string): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const line = formatLine(level, this.source, message);
    this.write(level, line);
    if (this.file && this.file.writable) {
      this.file.write(line + '\n');
    }
  }
}

/**
 * A log file that cannot be opened or written is reported once on the console
 * and the run carries on without it.
 */
export function createLogger(options: LoggerOptions = {}): RunLogger {
  const source = options.source ?? 'parser';
  const write = options.write ?? consoleWrite;
  const file = options.filePath
    ? createWriteStream(options.filePath, { flags: 'a', encoding: 'utf8' })
    : null;

  if (file) {
    let reported = false;
    file.on('error', error => {
      if (reported) return;
      reported = true;
      write('error', formatLine('error', source, `❌ Log file disabled: ${errorMessage(error)}`));
      file.destroy();
    });
  }

  return new RunLogger(source, options.level ?? 'info', write, file);
}
