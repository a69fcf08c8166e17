/**
 * Minimal leveled logger
 *
 * One line per message: `[timestamp] [LEVEL] scope: message`.
 * Loggers are passed explicitly through stage options; there is no global instance.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Receives formatted lines. Defaults to the console.
 */
export type LogSink = (level: MessageLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
  /** Clock used for timestamps */
  now?: () => Date;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  readonly level: LogLevel;
  readonly scope?: string;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create a logger sharing this one's level and sink with a nested scope
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      now: this.now,
    });
  }

  isEnabled(level: MessageLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.print('debug', message);
  }

  info(message: string): void {
    this.print('info', message);
  }

  warn(message: string): void {
    this.print('warn', message);
  }

  error(message: string): void {
    this.print('error', message);
  }

  private print(level: MessageLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const prefix = this.scope ? `${this.scope}: ` : '';
    this.sink(level, `[${this.now().toISOString()}] [${level.toUpperCase()}] ${prefix}${message}`);
  }
}

/**
 * Logger used when a stage receives none
 */
export function defaultLogger(): Logger {
  return new Logger({ level: 'warn' });
}

/**
 * Logger that drops every message
 */
export function silentLogger(): Logger {
  return new Logger({ level: 'silent' });
}
