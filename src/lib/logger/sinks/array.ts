import type { ArrayLogTransformer, LogEntry, LogSink } from '../types';

/**
 * ArraySink keeps log entries in memory, mainly for assertions in tests
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    const transformed = this.transformer ? this.transformer(entry) : false;
    this.logs.push(transformed === false ? entry : transformed);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * Messages as `type: message` lines, optionally only for one service
   */
  public getMessages(serviceName?: string): string[] {
    return this.logs
      .filter((log) => serviceName === undefined || log.serviceName === serviceName)
      .map((log) => `${log.type}: ${log.message}`);
  }

  public close(): void {
    this.closed = true;
  }
}
