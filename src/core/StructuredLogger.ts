// Structured logs with levels, component context and two output formats

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export type LogFormat = 'pretty' | 'json';

export interface LogContext {
  component?: string;
  operation?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: LogContext;
  error?: { name: string; message: string; stack?: string };
  performance?: {
    durationMs: number;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  colors?: boolean;
  component?: string;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((value || '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return fallback;
  }
}

export class StructuredLogger {
  private readonly logLevel: LogLevel;
  private readonly format: LogFormat;
  private readonly colors: boolean;
  private readonly baseContext: LogContext;
  private timers: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}, baseContext: LogContext = {}) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.format = options.format ?? 'pretty';
    this.colors = options.colors ?? false;
    this.baseContext = options.component
      ? { ...baseContext, component: options.component }
      : baseContext;
  }

  /**
   * Logger sharing level and format, tagged with a component name
   */
  child(component: string, context: LogContext = {}): StructuredLogger {
    return new StructuredLogger(
      { level: this.logLevel, format: this.format, colors: this.colors },
      { ...this.baseContext, ...context, component }
    );
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context: LogContext = {}): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: unknown, context: LogContext = {}): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  startTimer(operation: string): void {
    this.timers.set(operation, Date.now());
  }

  /**
   * Stops a timer started with startTimer and logs its duration at INFO
   */
  endTimer(operation: string, message: string, context: LogContext = {}): number | null {
    const startTime = this.timers.get(operation);
    if (startTime === undefined) {
      return null;
    }

    const durationMs = Date.now() - startTime;
    this.timers.delete(operation);
    this.log(LogLevel.INFO, message, { ...context, operation }, undefined, { durationMs });
    return durationMs;
  }

  private log(
    level: LogLevel,
    message: string,
    context: LogContext,
    error?: unknown,
    performance?: LogEntry['performance']
  ): void {
    if (level < this.logLevel) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: { ...this.baseContext, ...context }
    };

    if (error !== undefined) {
      logEntry.error = serializeError(error);
    }

    if (performance) {
      logEntry.performance = performance;
    }

    this.writeToConsole(level, this.format === 'json' ? JSON.stringify(logEntry) : this.formatPretty(logEntry));
  }

  private formatPretty(logEntry: LogEntry): string {
    const { timestamp, level, message, error, performance } = logEntry;
    const { component, ...rest } = logEntry.context;

    let formatted = `[${timestamp}] ${level.padEnd(5)}`;
    if (component) {
      formatted += ` [${component}]`;
    }
    formatted += ` ${message}`;

    if (Object.keys(rest).length > 0) {
      formatted += ` | ${JSON.stringify(rest)}`;
    }

    if (performance) {
      formatted += ` | ${performance.durationMs}ms`;
    }

    if (error) {
      formatted += ` | ${error.name}: ${error.message}`;
      if (error.stack && this.logLevel === LogLevel.DEBUG) {
        formatted += `\n${error.stack}`;
      }
    }

    return formatted;
  }

  private writeToConsole(level: LogLevel, line: string): void {
    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m',  // Green
      [LogLevel.WARN]: '\x1b[33m',  // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.FATAL]: '\x1b[35m'  // Magenta
    };
    const output = this.colors ? `${colors[level]}${line}\x1b[0m` : line;

    if (level >= LogLevel.ERROR) {
      console.error(output);
    } else if (level === LogLevel.WARN) {
      console.warn(output);
    } else {
      console.log(output);
    }
  }
}

function serializeError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}
