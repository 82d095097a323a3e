import type { LogOptions, LogType } from './types';
import type { HandleLog } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * Logger scoped to a service name (one per lifecycle node), optionally
 * narrowed further to an entity such as a child node or a background task.
 */
export class LoggerService {
  private readonly handleLog: HandleLog;
  private readonly serviceName: string;
  private readonly entityName?: string;

  constructor(handleLog: HandleLog, serviceName: string, entityName?: string) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  /**
   * Scope subsequent logs to an entity within this service
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
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
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  private log(type: LogType, message: string, options?: LogOptions): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
    });
  }
}
