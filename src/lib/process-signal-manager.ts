import { safeHandleCallback } from './safe-handle-callback';

/**
 * The signals that request a stop
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export interface ProcessSignalManagerStatus {
  isAttached: boolean;

  /** Which handlers are registered */
  handlers: {
    shutdown: boolean;
    restart: boolean;
    info: boolean;
  };
}

export interface ProcessSignalManagerOptions {
  /** SIGINT or SIGTERM */
  onShutdownRequested?: (signal: ShutdownSignal) => void | Promise<void>;

  /** SIGHUP */
  onRestartRequested?: () => void | Promise<unknown>;

  /** SIGUSR1, e.g. to print the supervision tree */
  onInfoRequested?: () => void | Promise<unknown>;
}

/**
 * Routes process signals to callbacks while attached.
 *
 * Callbacks run through `safeHandleCallback`, so a failing handler is
 * reported instead of crashing the process.
 */
export class ProcessSignalManager {
  private readonly onShutdownRequested?: ProcessSignalManagerOptions['onShutdownRequested'];
  private readonly onRestartRequested?: ProcessSignalManagerOptions['onRestartRequested'];
  private readonly onInfoRequested?: ProcessSignalManagerOptions['onInfoRequested'];

  private readonly listeners: Array<[NodeJS.Signals, () => void]> = [];
  private _isAttached = false;

  constructor(options: ProcessSignalManagerOptions) {
    this.onShutdownRequested = options.onShutdownRequested;
    this.onRestartRequested = options.onRestartRequested;
    this.onInfoRequested = options.onInfoRequested;

    // Built once so detach() removes the exact functions attach() added
    if (this.onShutdownRequested) {
      for (const signal of SHUTDOWN_SIGNALS) {
        this.listeners.push([signal, () => this.triggerShutdown(signal)]);
      }
    }

    if (this.onRestartRequested) {
      this.listeners.push(['SIGHUP', () => this.triggerRestart()]);
    }

    if (this.onInfoRequested) {
      this.listeners.push(['SIGUSR1', () => this.triggerInfo()]);
    }
  }

  public get isAttached(): boolean {
    return this._isAttached;
  }

  /** Signals this manager listens for once attached */
  public get signals(): NodeJS.Signals[] {
    return this.listeners.map(([signal]) => signal);
  }

  public getStatus(): ProcessSignalManagerStatus {
    return {
      isAttached: this._isAttached,
      handlers: {
        shutdown: !!this.onShutdownRequested,
        restart: !!this.onRestartRequested,
        info: !!this.onInfoRequested,
      },
    };
  }

  /**
   * Start listening. Idempotent.
   */
  public attach(): void {
    if (this._isAttached) {
      return;
    }

    for (const [signal, listener] of this.listeners) {
      process.on(signal, listener);
    }

    this._isAttached = true;
  }

  /**
   * Stop listening. Idempotent.
   */
  public detach(): void {
    if (!this._isAttached) {
      return;
    }

    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener);
    }

    this._isAttached = false;
  }

  public triggerShutdown(signal: ShutdownSignal): void {
    if (this._isAttached && this.onShutdownRequested) {
      safeHandleCallback('onShutdownRequested', this.onShutdownRequested, signal);
    }
  }

  public triggerRestart(): void {
    if (this._isAttached && this.onRestartRequested) {
      safeHandleCallback('onRestartRequested', this.onRestartRequested);
    }
  }

  public triggerInfo(): void {
    if (this._isAttached && this.onInfoRequested) {
      safeHandleCallback('onInfoRequested', this.onInfoRequested);
    }
  }
}
