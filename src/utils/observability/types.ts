export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields stamped on every line; `runId`/`messageId` are bound per message. */
export type LogContext = {
  service?: string;
  component?: string;
  runId?: string;
  messageId?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

export type LogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
} & LogContext & LogData;

/** A destination for serialised records (console, file). */
export interface LogSink {
  write(record: LogRecord, line: string): void;
}

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(context: LogContext): AppLogger;
}
