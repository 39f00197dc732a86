/**
 * NDJSON logger.
 *
 * Records go to the console (warn/error on stderr, the rest on stdout) and,
 * in development, are appended to a local file as well. `APP_LOG_FILE`
 * names the file (`off` disables it); otherwise it lands under
 * `APP_LOG_DIR/<date>/tripmail.ndjson`.
 */

import { WriteStream, createWriteStream, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { currentLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, LogContext, LogData, LogLevel, LogRecord, LogSink } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function thresholdLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

const consoleSink: LogSink = {
  write(record, line) {
    const stream = record.level === 'warn' || record.level === 'error' ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  },
};

/** Append-only file sink; reopens when the target path changes (e.g. at midnight). */
class FileSink implements LogSink {
  private path: string | null = null;
  private stream: WriteStream | null = null;

  write(_record: LogRecord, line: string): void {
    const target = FileSink.targetPath();
    if (target === null) return;
    this.open(target)?.write(`${line}\n`);
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
    this.path = null;
  }

  private open(target: string): WriteStream | null {
    if (this.stream && this.path === target) return this.stream;
    this.close();

    try {
      mkdirSync(dirname(target), { recursive: true });
      const stream = createWriteStream(target, { flags: 'a', encoding: 'utf-8' });
      stream.on('error', (err: Error) => {
        process.stderr.write(`log file sink failed: ${err.message}\n`);
        this.stream = null;
        this.path = null;
      });
      this.stream = stream;
      this.path = target;
      return stream;
    } catch (err) {
      process.stderr.write(`log file sink unavailable: ${err instanceof Error ? err.message : String(err)}\n`);
      return null;
    }
  }

  private static targetPath(): string | null {
    if (process.env.NODE_ENV !== 'development') return null;
    const explicit = process.env.APP_LOG_FILE;
    if (explicit === 'off') return null;
    if (explicit) return explicit;
    const day = new Date().toISOString().slice(0, 10);
    return join(process.env.APP_LOG_DIR || './logs', day, 'tripmail.ndjson');
  }
}

const fileSink = new FileSink();
const sinks: readonly LogSink[] = [consoleSink, fileSink];
let exitHookInstalled = false;

function emit(level: LogLevel, event: string, baseContext: LogContext, data?: LogData): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[thresholdLevel()]) return;

  const record: LogRecord = {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...currentLogContext(),
    ...baseContext,
    ...(data ? redactSecrets(data) : {}),
  };
  const line = JSON.stringify(record);
  for (const sink of sinks) {
    sink.write(record, line);
  }
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  return {
    debug: (event, data) => emit('debug', event, baseContext, data),
    info: (event, data) => emit('info', event, baseContext, data),
    warn: (event, data) => emit('warn', event, baseContext, data),
    error: (event, data) => emit('error', event, baseContext, data),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: AppLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/** Flush the file sink on process exit. Safe to call more than once. */
export function initObservability(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', () => fileSink.close());
}
