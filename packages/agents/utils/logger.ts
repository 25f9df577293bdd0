// Scoped structured logger for orchestration diagnostics
// Writes `[Scope:LEVEL] message {json}` lines to stderr so stdout stays free
// for reports and CLI output.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const stderrSink: LogSink = (line) => console.error(line);

export function formatLogLine(
  scope: string,
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
): string {
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  return data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
}

export function createLogger(scope: string, sink: LogSink = stderrSink): Logger {
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    sink(formatLogLine(scope, level, message, data));
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (childScope) => createLogger(`${scope}.${childScope}`, sink),
  };
}
