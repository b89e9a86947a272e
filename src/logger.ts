/**
 * Structured, level-based logging.
 *
 * Every entry is one JSON line. Modules log through `logger.child({ module })`
 * so each line names the component and the module that wrote it. Context
 * fields that carry credentials are masked before an entry reaches the sink.
 * Tests and embedders swap the sink with setLogHandler() and raise the floor
 * with setLogLevel().
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

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger whose entries also carry `context`. */
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Context keys (lower-cased) whose values never reach the sink. */
const CREDENTIAL_KEYS: ReadonlySet<string> = new Set(['password', 'token', 'x-auth-token', 'x-subject-token']);

export const REDACTED = '[redacted]';

/** Writes one JSON line per entry; warnings and errors go to stderr. */
const consoleHandler: LogHandler = (entry) => {
  const line = JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context });
  if (entry.level === LogLevel.Error) console.error(line);
  else if (entry.level === LogLevel.Warn) console.warn(line);
  else console.log(line);
};

let currentHandler: LogHandler = consoleHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the sink (e.g. to capture entries in tests). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/** Shallow copy of `context` with credential-bearing fields masked. */
export function redact(context: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    masked[key] = CREDENTIAL_KEYS.has(key.toLowerCase()) ? REDACTED : value;
  }
  return masked;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({ level, message, context: redact(context), timestamp: new Date().toISOString() });
}

/** Create a logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void =>
      emit(level, message, { ...baseContext, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (childContext) => createLogger({ ...baseContext, ...childContext }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'mock-cloud-api' });
