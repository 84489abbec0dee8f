// Minimal leveled logger. Everything goes to stderr so that generated output
// written to stdout stays clean.

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG
};

export type LogSink = (line: string) => void;

export class Logger {
  private level: LogLevel = LogLevel.INFO;
  private sink: LogSink = line => process.stderr.write(line + '\n');

  setLevel(level: LogLevel | LogLevelName): void {
    this.level = typeof level === 'string' ? LEVEL_NAMES[level] : level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Redirects output, e.g. to capture it in tests. Returns the previous sink. */
  setSink(sink: LogSink): LogSink {
    const previous = this.sink;
    this.sink = sink;
    return previous;
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  warn(message: string): void {
    this.write(LogLevel.WARN, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  private write(level: LogLevel, message: string): void {
    if (level > this.level) {
      return;
    }
    this.sink(`[${LogLevel[level]}] ${message}`);
  }
}

export const logger = new Logger();
