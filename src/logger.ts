/**
 * Logger abstraction.
 *
 * Provides structured, level-based logging with context. The default
 * handler writes JSON lines; the CLI installs its own handler that
 * formats entries as JSON or as text (formatTextEntry).
 * Consumers can replace the handler by calling setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Parse a level name; returns undefined for unknown names. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function write(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

/** Default log handler writes structured JSON to console. */
export const jsonLogHandler: LogHandler = (entry: LogEntry) => {
  write(entry.level, formatJsonEntry(entry));
};

export function formatJsonEntry(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
}

/**
 * Human-readable line: `[step] message key=value`.
 * Command output lines (context.stream set) are printed bare under the step.
 */
export function formatTextEntry(entry: LogEntry): string {
  const { component: _component, step, stream, ...rest } = entry.context ?? {};
  const prefix = typeof step === 'string' ? `[${step}] ` : '';
  if (typeof stream === 'string') {
    return `${prefix}${entry.message}`;
  }
  const level = entry.level === LogLevel.Info ? '' : `${entry.level.toUpperCase()} `;
  const fields = Object.entries(rest)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return `${level}${prefix}${entry.message}${fields.length > 0 ? ` ${fields.join(' ')}` : ''}`;
}

let currentHandler: LogHandler = jsonLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log handler (e.g., for testing or the CLI's text output). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

/** Create a child logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Root logger instance. */
export const logger = createLogger({ component: 'docs-flow' });
