import { format } from 'date-fns';
import type { LogEntry, LogSink } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  muted?: boolean;
  minLevel?: LogLevel;
}

/**
 * ConsoleSink writes logs to the console with optional colors, timestamps and type labels
 */
export class ConsoleSink implements LogSink {
  private colors: boolean;
  private timestamps: boolean;
  private typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw type - no formatting and always shown
    if (entry.type === 'raw') {
      // eslint-disable-next-line no-console
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const line = this.format(entry);
    const text = this.colors ? colorize(entry.type, line) : line;

    switch (entry.type) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(text);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(text);
        break;
      case 'info':
        // eslint-disable-next-line no-console
        console.info(text);
        break;
      case 'success':
      case 'notice':
      case 'debug':
        // eslint-disable-next-line no-console
        console.log(text);
        break;
    }
  }

  /**
   * Build the uncolored line: `[timestamp] [TYPE] [service] [entity] message`
   */
  public format(entry: LogEntry): string {
    let line = '';

    if (this.timestamps) {
      line += `[${format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss')}] `;
    }

    if (this.typeLabels) {
      line += `[${entry.type.toUpperCase()}] `;
    }

    if (entry.serviceName) {
      line += `[${entry.serviceName}] `;
    }

    if (entry.entityName) {
      line += `[${entry.entityName}] `;
    }

    return line + entry.message;
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public close(): void {
    this.closed = true;
  }
}
