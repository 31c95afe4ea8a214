export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
  sink?: (line: string) => void; // Defaults to stderr; stdout is reserved for results
}

export interface Log {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  child(context: LogContext): Log;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const REDACTED_KEYS = new Set(['token', 'auth', 'authorization']);

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function redact(context: LogContext): LogContext {
  const safe: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    safe[key] = REDACTED_KEYS.has(key.toLowerCase()) && value !== undefined ? '***' : value;
  }
  return safe;
}

export class Logger implements Log {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.sink = options.sink ?? ((line: string) => process.stderr.write(line + '\n'));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, msg: string, context?: LogContext): string {
    const safeContext = context ? redact(context) : undefined;
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...safeContext,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr =
      safeContext && Object.keys(safeContext).length > 0 ? ` ${JSON.stringify(safeContext)}` : '';
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }

  private write(level: LogLevel, msg: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    this.sink(this.formatMessage(level, msg, context));
  }

  debug(msg: string, context?: LogContext): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.write('error', msg, context);
  }

  child(context: LogContext): Log {
    return new ChildLogger(this, context);
  }

  // Returns a function that logs the elapsed time at debug level
  time(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: Math.round(duration) });
    };
  }
}

class ChildLogger implements Log {
  constructor(
    private parent: Log,
    private context: LogContext
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: LogContext): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: LogContext): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: LogContext): void {
    this.parent.error(msg, { ...this.context, ...context });
  }

  child(context: LogContext): Log {
    return new ChildLogger(this, context);
  }
}

let globalLogger: Logger | null = null;

export function createLogger(options: LoggerOptions): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    // Default logger for use before config is loaded
    globalLogger = new Logger({ level: 'info', json: false });
  }
  return globalLogger;
}
