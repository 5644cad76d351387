export interface TraceContext {
  traceId: string;
  spanId: string;
  parentId?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  ts: number;
  level: LogLevel;
  msg: string;
  component: string;
  traceId?: string;
  spanId?: string;
  error?: SerializedError;
  // Additional structured data
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, error?: unknown, meta?: object): void;

  // Create a child logger with additional context (e.g. component name)
  child(meta: object): Logger;

  // Create a logger bound to a request trace
  withContext(ctx: TraceContext): Logger;
}
