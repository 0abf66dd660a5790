type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type LogFields = Record<string, JsonValue>;
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export interface Logger {
  child(context: LogFields): Logger;
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  fatal(message: string, fields?: LogFields): void;
}

/**
 * Receives one serialized JSON line per log entry. The default sink writes
 * error and fatal entries to stderr and everything else to stdout.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  service: string;
  level: LogLevel;
  sink?: LogSink;
}

const levelPriority: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const sensitiveKeyPattern = /authorization|cookie|token|secret|password|api[-_]?key|signature/i;

const consoleSink: LogSink = (level, line) => {
  if (levelPriority[level] >= levelPriority.error) {
    console.error(line);
    return;
  }

  console.log(line);
};

function sanitizeValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item));
  }

  if (typeof value === 'object') {
    const sanitizedObject: { [key: string]: JsonValue } = {};

    for (const [key, nestedValue] of Object.entries(value)) {
      sanitizedObject[key] = sensitiveKeyPattern.test(key)
        ? '[REDACTED]'
        : sanitizeValue(nestedValue);
    }

    return sanitizedObject;
  }

  return String(value);
}

function sanitizeFields(fields: LogFields): LogFields {
  const sanitized: LogFields = {};

  for (const [key, value] of Object.entries(fields)) {
    sanitized[key] = sensitiveKeyPattern.test(key) ? '[REDACTED]' : sanitizeValue(value);
  }

  return sanitized;
}

class JsonLogger implements Logger {
  private readonly sink: LogSink;

  constructor(
    private readonly options: LoggerOptions,
    private readonly context: LogFields = {},
  ) {
    this.sink = options.sink ?? consoleSink;
  }

  child(context: LogFields): Logger {
    return new JsonLogger(this.options, { ...this.context, ...sanitizeFields(context) });
  }

  trace(message: string, fields?: LogFields): void {
    this.log('trace', message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  fatal(message: string, fields?: LogFields): void {
    this.log('fatal', message, fields);
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (levelPriority[level] < levelPriority[this.options.level]) {
      return;
    }

    const payload = {
      timestamp: new Date().toISOString(),
      level,
      service: this.options.service,
      message,
      ...this.context,
      ...(fields === undefined ? {} : sanitizeFields(fields)),
    };

    this.sink(level, JSON.stringify(payload));
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new JsonLogger(options);
}

export function createSilentLogger(): Logger {
  return new JsonLogger({ service: 'silent', level: 'fatal', sink: () => undefined });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
}
