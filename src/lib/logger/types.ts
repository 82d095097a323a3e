/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2, // Normal but significant condition
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // Same level as SUCCESS (routine operational info)
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'info'
  | 'warn'
  | 'success'
  | 'notice'
  | 'debug'
  | 'raw';

export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

export interface LogOptions {
  exitCode?: number;
  params?: Record<string, unknown>;
  tags?: string[];
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // e.g. 'orchestrator', 'producer'
  entityName?: string; // e.g. a child node or task name
  template: string; // "Starting {{count}} dependencies"
  message: string; // "Starting 5 dependencies"
  params?: Record<string, unknown>;
  error?: unknown; // Original error object from errorObject() calls
  exitCode?: number;
  tags?: string[];
}

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export interface LoggerOptions {
  sinks?: LogSink[];

  /** Exit the process after a log entry carrying an exit code (default true) */
  callProcessExit?: boolean;

  onSinkError?: (
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ) => void;
}

export interface LoggerEventMap {
  logger: LoggerEvent;
}

export type LoggerEvent =
  | {
      eventType: 'log';
      logType: LogType;
      message: string;
      timestamp: number;
    }
  | { eventType: 'exit-process'; code: number }
  | { eventType: 'callback-error'; error: Error }
  | { eventType: 'close' };
