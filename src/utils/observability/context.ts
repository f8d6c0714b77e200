import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

export function createRunId(prefix = 'run'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/** Run `fn` with `context` merged over the caller's context. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContextStorage.run({ ...getLogContext(), ...context }, fn);
}

/**
 * Run `fn` under a fresh id stored as `key` (runId for agent runs,
 * batchId for batch slices). Records logged inside carry the id.
 */
export function withRunContext<T>(key: 'runId' | 'batchId', fn: () => T): T {
  const prefix = key === 'runId' ? 'run' : 'batch';
  return withLogContext({ [key]: createRunId(prefix) }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}
