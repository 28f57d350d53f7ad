/**
 * Structured, level-based logging for the client.
 *
 * Each client gets its own logger so that two clients configured differently
 * never change each other's output. Pass `logger` in the client options to
 * route entries into an application's own log pipeline.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: `warn`). */
  level?: LogLevel;
  handler?: LogHandler;
  context?: Record<string, unknown>;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Writes one JSON line per entry to stderr. */
export const stderrLogHandler: LogHandler = (entry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  process.stderr.write(`${JSON.stringify(output)}\n`);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'warn';
  const handler = options.handler ?? stderrLogHandler;
  const baseContext = options.context ?? {};

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    handler({
      level,
      message,
      context: { ...baseContext, ...context },
      timestamp: new Date().toISOString(),
    });
  };

  return {
    debug: (msg, ctx) => log('debug', msg, ctx),
    info: (msg, ctx) => log('info', msg, ctx),
    warn: (msg, ctx) => log('warn', msg, ctx),
    error: (msg, ctx) => log('error', msg, ctx),
    child: (childCtx) => createLogger({
      level: minLevel,
      handler,
      context: { ...baseContext, ...childCtx },
    }),
  };
}
