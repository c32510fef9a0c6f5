/**
 * Structured logger used across the pem-chain packages.
 * Entries are emitted as JSON lines unless a custom output is supplied.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  SILENT = 5,
}

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  level: string;
  message: string;
  timestamp: string;
  component?: string;
  [key: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.TRACE]: 'TRACE',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

const defaultOutput: LogOutput = (entry) => {
  console.log(JSON.stringify(entry));
};

export interface LoggerOptions {
  /** Minimum level to emit, defaults to INFO */
  level?: LogLevel;
  component?: string;
  output?: LogOutput;
}

/**
 * Level-filtered logger with component-scoped children.
 *
 * ```ts
 * const log = new Logger({ component: 'chain' });
 * log.child('interpreter').warn('unknown block type', { name: 'FOO' });
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.output = options.output ?? defaultOutput;
  }

  trace(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, fields);
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /** Child logger sharing level and output; components nest as `parent.child`. */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
    });
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    };

    this.output(entry);
  }
}
