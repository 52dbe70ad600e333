/**
 * Structured JSON logging for the field advisory engine.
 * One line per entry; context is carried by child loggers.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  fieldId?: string;
  source?: string;
  functionName?: string;
  requestId?: string;
  [key: string]: unknown;
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
  data?: LogData;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const line = JSON.stringify(entry);
    if (entry.level === LogLevel.ERROR) {
      console.error(line);
    } else if (entry.level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Keeps entries in memory; used by tests and local tooling
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter(entry => !level || entry.level === level).map(entry => entry.message);
  }
}

export interface LoggerOptions {
  level?: LogLevel | string;
  sink?: LogSink;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const REDACTED = '[REDACTED]';
const SENSITIVE_KEY = /secret|token|password|authorization/i;

export function parseLogLevel(level: string | undefined): LogLevel {
  const upperLevel = (level ?? '').toUpperCase();
  return LEVEL_ORDER.find(candidate => candidate === upperLevel) ?? LogLevel.INFO;
}

function redact<T extends Record<string, unknown>>(values: T): T {
  const copy = { ...values };
  for (const key of Object.keys(copy)) {
    if (SENSITIVE_KEY.test(key)) {
      Object.assign(copy, { [key]: REDACTED });
    }
  }
  return copy;
}

function serializeError(error: unknown): unknown {
  if (!(error instanceof Error)) {
    return error;
  }
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...(error.cause !== undefined ? { cause: serializeError(error.cause) } : {}),
  };
}

export class Logger {
  private readonly context: LogContext;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(context: LogContext = {}, options: LoggerOptions = {}) {
    this.context = redact(context);
    this.level = parseLogLevel(options.level ?? process.env.LOG_LEVEL);
    this.sink = options.sink ?? new ConsoleSink();
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.sink.write({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      data: data && redact(data),
    });
  }

  debug(message: string, data?: LogData): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.write(LogLevel.ERROR, message, { ...data, error: serializeError(error) });
  }

  /**
   * Same level and sink, merged context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, { level: this.level, sink: this.sink });
  }

  performance(operation: string, durationMs: number, data?: LogData): void {
    this.info(`Performance: ${operation}`, {
      operation,
      duration: durationMs,
      unit: 'ms',
      ...data,
    });
  }

  /**
   * Field lifecycle events, flagged for audit queries
   */
  audit(action: string, resource: string, userId?: string, data?: LogData): void {
    this.info(`Audit: ${action}`, {
      action,
      resource,
      userId,
      auditEvent: true,
      ...data,
    });
  }
}

export function createLambdaLogger(functionName: string, requestId?: string, options: LoggerOptions = {}): Logger {
  return new Logger({
    functionName,
    requestId: requestId || process.env.AWS_REQUEST_ID,
  }, options);
}
