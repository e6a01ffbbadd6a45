/**
 * JSON-lines logging for the paste server.
 *
 * Each entry becomes one line: `level`, `ts` and `msg` first, then the
 * context fields flattened beside them. Debug and info lines go to stdout,
 * warn and error lines to stderr. Tests route entries elsewhere with
 * setLogHandler() and put the stream writer back with resetLogHandler().
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
  /** Logger that adds `context` to every entry, e.g. `{ pasteId }`. */
  child(context: Record<string, unknown>): Logger;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

/** One output line for `entry`, without the trailing newline. */
export function formatLogLine(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
}

const writeToStreams: LogHandler = (entry) => {
  const stream = entry.level === LogLevel.Warn || entry.level === LogLevel.Error ? process.stderr : process.stdout;
  stream.write(`${formatLogLine(entry)}\n`);
};

let handler: LogHandler = writeToStreams;
let threshold: LogLevel = LogLevel.Info;

export function setLogHandler(next: LogHandler): void {
  handler = next;
}

export function resetLogHandler(): void {
  handler = writeToStreams;
}

/** Set from `--log-level`; entries below it are dropped. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

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
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

export const logger = createLogger({ component: 'lanpaste' });
