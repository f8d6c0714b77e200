export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields every record inherits from the active context and the logger. */
export type LogContext = {
  /** One agent run */
  runId?: string;
  /** One batch slice over recipient files */
  batchId?: string;
  domain?: string;
  operation?: string;
  toolName?: string;
  toolUseId?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

export type AppLogRecord = LogContext & LogData & {
  timestamp: string;
  level: LogLevel;
  event: string;
};

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  /** Logger whose records also carry `context` */
  child(context: LogContext): AppLogger;
}
