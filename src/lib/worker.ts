import type { Logger } from './logger';
import { EOL } from './constants';
import { ProcessSignalManager } from './process-signal-manager';
import type { ShutdownSignal } from './process-signal-manager';
import { LifecycleNode } from './supervision/lifecycle-node';
import { describeTree } from './supervision/tree-report';
import type { Application } from './app/application';

export interface WorkerOptions {
  /** Root logger (default: the application's) */
  logger?: Logger;

  /** Route SIGINT/SIGTERM, SIGHUP and SIGUSR1 to the worker (default true) */
  attachSignals?: boolean;

  /** Run the application's web façade next to it (default true) */
  web?: boolean;

  /** Per-child stop deadline, 0 waits indefinitely */
  stopTimeoutMS?: number;
}

/**
 * Runs one application until it is told to stop.
 *
 * The worker's children are the application's orchestrator and its web
 * façade. While running it maps process signals onto its lifecycle:
 * SIGINT and SIGTERM stop, SIGHUP restarts, SIGUSR1 logs the supervision
 * tree. Once the application is fully started it logs that it is ready,
 * unless the application set its own `onStartupFinished`.
 */
export class Worker extends LifecycleNode {
  public readonly app: Application;

  private readonly includeWeb: boolean;
  private readonly signals: ProcessSignalManager | null;
  private isRestarting = false;

  constructor(app: Application, options: WorkerOptions = {}) {
    super({
      name: 'worker',
      logger: options.logger ?? app.logger,
      context: app.schedulingContext,
      stopTimeoutMS: options.stopTimeoutMS,
    });

    this.app = app;
    this.includeWeb = options.web ?? true;
    this.signals =
      (options.attachSignals ?? true)
        ? new ProcessSignalManager({
            onShutdownRequested: (signal) => this.handleShutdownSignal(signal),
            onRestartRequested: () => this.handleRestartSignal(),
            onInfoRequested: () => this.logTree(),
          })
        : null;
  }

  public get signalManager(): ProcessSignalManager | null {
    return this.signals;
  }

  /**
   * Start, and end the process with exit code 1 if startup fails
   *
   * @returns true if the worker started
   */
  public async run(): Promise<boolean> {
    try {
      await this.start();
      return true;
    } catch (error) {
      this.logger.errorObject('Worker failed to start', error, {
        exitCode: 1,
      });

      return false;
    }
  }

  /** Log the supervision tree, one line per node */
  public logTree(): void {
    this.logger.info(describeTree(this).join(EOL));
  }

  protected resolveDependencies(): LifecycleNode[] {
    return this.includeWeb
      ? [this.app.orchestrator, this.app.web]
      : [this.app.orchestrator];
  }

  protected onFirstStart(): void {
    // Attached before any child starts so a signal can interrupt startup
    this.signals?.attach();

    if (!this.app.onStartupFinished) {
      this.app.onStartupFinished = () => {
        this.logger.success('Ready: {{label}}', {
          params: { label: this.app.label },
        });
        this.logTree();
      };
    }
  }

  protected onStart(): void {
    this.isRestarting = false;
    this.signals?.attach();
  }

  protected onRestart(): void {
    this.isRestarting = true;
  }

  protected onShutdown(): void {
    // Keep listening through a restart so a second signal still lands
    if (!this.isRestarting) {
      this.signals?.detach();
    }
  }

  private async handleShutdownSignal(signal: ShutdownSignal): Promise<void> {
    this.logger.notice('Received {{signal}}, stopping', { params: { signal } });

    try {
      await this.stop();
    } catch (error) {
      this.logger.errorObject('Stop failed', error);
    }
  }

  private async handleRestartSignal(): Promise<void> {
    this.logger.notice('Received SIGHUP, restarting');

    try {
      await this.restart();
    } catch (error) {
      this.logger.errorObject('Restart failed', error);
    }
  }
}
