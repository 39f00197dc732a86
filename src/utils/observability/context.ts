import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const runStorage = new AsyncLocalStorage<LogContext>();

/** Context bound by the innermost enclosing withLogContext, or `{}`. */
export function currentLogContext(): LogContext {
  return runStorage.getStore() ?? {};
}

/** Run `fn` with `context` layered over whatever is already bound. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return runStorage.run({ ...currentLogContext(), ...context }, fn);
}

export function newRunId(prefix = 'run'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Bind a fresh run id and the message id for the duration of `fn`, so every
 * line written while one message is processed can be grepped together.
 */
export function withMessageRun<T>(messageId: string, fn: () => T): T {
  return withLogContext({ runId: newRunId('msg'), messageId }, fn);
}
