/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context. Pipeline components
 * take a Logger and fall back to the process-wide one from getLogger().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: SerializedError | string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: SerializedError;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

// Deepest cause chain written into an entry
const MAX_CAUSE_DEPTH = 5;

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly context: Record<string, unknown>;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? ((entry) => this.write(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  get currentLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    this.output(entry);
  }

  private write(entry: LogEntry): void {
    const line = this.format === 'json' ? JSON.stringify(entry) : this.pretty(entry);

    if (LOG_LEVELS[entry.level] >= LOG_LEVELS.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private pretty(entry: LogEntry): string {
    const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
    let line = `${DIM}${entry.timestamp}${RESET} ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
    }

    let error: SerializedError | string | undefined = entry.error;
    while (error && typeof error !== 'string') {
      line += `\n${DIM}${error.stack ?? `${error.name}: ${error.message}`}${RESET}`;
      error = error.cause;
    }

    return line;
  }
}

/**
 * Flatten an error and its cause chain for a log entry
 */
export function serializeError(error: unknown, depth = 0): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'NonError', message: String(error) };
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }

  if (error.cause !== undefined) {
    serialized.cause =
      depth + 1 >= MAX_CAUSE_DEPTH ? String(error.cause) : serializeError(error.cause, depth + 1);
  }

  return serialized;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

// Default logger instance
let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = process.env.NODE_ENV === 'production';
    defaultLogger = new Logger({
      level: production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Logger that drops every entry
 */
export function createSilentLogger(): Logger {
  return new Logger({ output: () => {} });
}
