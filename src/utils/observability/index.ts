/**
 * Structured NDJSON logging with async run context and redaction.
 */

export type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';
export { createRunId, getLogContext, withLogContext, withRunContext } from './context.js';
export { createLogger, initObservability } from './logger.js';
export { redactEmail, redactSecrets, safeSnippet } from './redaction.js';
