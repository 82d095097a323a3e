import { EventEmitterProtected } from '../event-emitter';
import { isNumber } from '../is-number';
import { isPromise } from '../is-promise';
import { onCallbackError } from '../safe-handle-callback';
import { toError } from '../to-error';
import type {
  LogEntry,
  LogSink,
  LogType,
  LoggerEventMap,
  LoggerOptions,
  LogOptions,
} from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { prepareErrorObjectLog } from './utils/error-object';
import { renderTemplate } from './utils/template';
import { LoggerService } from './logger-service';

/**
 * Sink-based logger. Every lifecycle node logs through a `LoggerService`
 * scoped from one root Logger.
 */
export class Logger extends EventEmitterProtected<LoggerEventMap> {
  private sinks: LogSink[];
  private callProcessExit: boolean;
  private onSinkError?: LoggerOptions['onSinkError'];

  private _didExit = false;
  private _exitCode = 0;
  private _closed = false;
  private detachCallbackErrors: (() => void) | null = null;

  constructor(options: LoggerOptions = {}) {
    super();

    this.sinks = options.sinks ?? [];
    this.callProcessExit = options.callProcessExit ?? true;
    this.onSinkError = options.onSinkError;
  }

  public get didExit(): boolean {
    return this._didExit;
  }

  public get exitCode(): number {
    return this._exitCode;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object with a prefix line
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  /**
   * Log failures of event listeners and other safely-handled callbacks.
   *
   * @returns 'already_registered' when this logger is already capturing
   */
  public captureCallbackErrors(
    prefix = 'Unhandled callback error',
  ): 'success' | 'already_registered' {
    if (this.detachCallbackErrors) {
      return 'already_registered';
    }

    let isReporting = false;

    this.detachCallbackErrors = onCallbackError((error) => {
      // A throwing 'logger' listener would otherwise report itself forever
      if (isReporting) {
        return;
      }

      isReporting = true;

      try {
        this.errorObject(prefix, error);
        this.emit('logger', { eventType: 'callback-error', error });
      } finally {
        isReporting = false;
      }
    });

    return 'success';
  }

  public releaseCallbackErrors(): 'success' | 'not_registered' {
    if (!this.detachCallbackErrors) {
      return 'not_registered';
    }

    this.detachCallbackErrors();
    this.detachCallbackErrors = null;

    return 'success';
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Returns true if the sink was found and removed
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);

    if (index === -1) {
      return false;
    }

    this.sinks.splice(index, 1);
    return true;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close all sinks. A closed logger drops every further entry.
   */
  public async close(): Promise<void> {
    this._closed = true;
    this.releaseCallbackErrors();

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (!sink.close) {
          return;
        }

        try {
          await sink.close();
        } catch (error) {
          this.handleSinkError(toError(error), 'close', sink);
        }
      }),
    );

    this.sinks = [];
    this.emit('logger', { eventType: 'close' });
  }

  /**
   * Create a logger for tests: an ArraySink for inspection, and process
   * exit disabled so an exit code never terminates the test runner.
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink();
    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];

    if (consoleSink) {
      sinks.push(consoleSink);
    }

    sinks.push(...(options?.sinks ?? []));

    return {
      logger: new Logger({ sinks, callProcessExit: false }),
      arraySink,
      consoleSink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const timestamp = Date.now();
    const params = options?.params;
    const exitCode = options?.exitCode;
    const tags = options?.tags;
    const message = params ? renderTemplate(template, params) : template;

    const entry: LogEntry = {
      timestamp,
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      template,
      message,
      params,
      error: options?.error,
      exitCode: isNumber(exitCode) ? exitCode : undefined,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          result.then(undefined, (error: unknown) => {
            this.handleSinkError(toError(error), 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(toError(error), 'write', sink);
      }
    }

    this.emit('logger', {
      eventType: 'log',
      logType: type,
      message,
      timestamp,
    });

    if (isNumber(exitCode)) {
      this.exit(exitCode);
    }
  }

  private exit(code: number): void {
    if (this._didExit) {
      return;
    }

    this._didExit = true;
    this._exitCode = code;
    this.emit('logger', { eventType: 'exit-process', code });

    void this.close().finally(() => {
      if (this.callProcessExit) {
        process.exit(code);
      }
    });
  }

  private handleSinkError(
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
        return;
      } catch {
        // fall through to console so the original failure isn't lost
      }
    }

    // eslint-disable-next-line no-console
    console.error(
      `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${error.message}`,
    );
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
