export type { AppLogger, LogContext, LogData, LogLevel, LogRecord, LogSink } from './types.js';

export { currentLogContext, newRunId, withLogContext, withMessageRun } from './context.js';
export { createLogger, initObservability, silentLogger } from './logger.js';
export { redactAddress, redactSecrets, safeSnippet } from './redaction.js';
