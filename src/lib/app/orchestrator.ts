import { LifecycleNode } from '../supervision/lifecycle-node';
import { ConfigurationError, appErrCodes } from './errors';
import { ExtraServiceRegistry } from './extra-service-registry';
import type { OrchestratedApp } from './types';
import { isZeroArgTask } from './types';

export interface OrchestratorOptions {
  stopTimeoutMS?: number;
  taskCancelTimeoutMS?: number;
}

/**
 * Root of an application's supervision tree.
 *
 * Picks the children for the application's mode, brings them up in
 * dependency order, waits for table recovery and then starts the extra
 * tasks and services registered on the application.
 *
 * Server mode start order:
 *
 * ```text
 * sensors (monitor included), producer, consumer, leader-assignor,
 * reply-consumer, agents, topic-router, table-manager, fetcher
 * ```
 *
 * Client-only mode skips sensors, agents, the leader assignor and the table
 * manager, and with them the recovery wait.
 */
export class Orchestrator<
  TApp extends OrchestratedApp<TApp>,
> extends LifecycleNode {
  public readonly app: TApp;

  /** Fixed at construction */
  public readonly clientOnly: boolean;

  private readonly extraServiceRegistry = new ExtraServiceRegistry();

  constructor(app: TApp, options: OrchestratorOptions = {}) {
    super({
      name: 'orchestrator',
      logger: app.logger,
      context: app.schedulingContext,
      stopTimeoutMS: options.stopTimeoutMS,
      taskCancelTimeoutMS: options.taskCancelTimeoutMS,
    });

    this.app = app;
    this.clientOnly = app.clientOnly;
  }

  public get label(): string {
    return this.app.label;
  }

  public get shortLabel(): string {
    return this.app.shortLabel;
  }

  /** Extra services created so far, null until the first activation */
  public get materializedExtraServices(): readonly LifecycleNode[] | null {
    return this.extraServiceRegistry.services;
  }

  /**
   * Materialize the application's extra services and start them as runtime
   * dependencies. Only the first call does anything.
   *
   * @returns The services this call added
   */
  public async activateExtraServices(): Promise<LifecycleNode[]> {
    const services = this.extraServiceRegistry.materialize(
      this.app.extraServices,
      () => ({
        logger: this.rootLogger,
        context: this.app.schedulingContext,
        beacon: this.beacon,
      }),
    );

    if (!services) {
      return [];
    }

    for (const service of services) {
      await this.addRuntimeDependency(service);
    }

    return services;
  }

  protected resolveDependencies(): LifecycleNode[] {
    const app = this.app;

    if (this.clientOnly) {
      return [
        app.producer,
        app.consumer,
        app.replyConsumer,
        app.topicRouter,
        app.fetcher,
      ];
    }

    // The monitor always runs, whether or not the user registered it
    app.monitor.beacon.reattach(this.beacon);
    app.monitor.bindContext(app.schedulingContext);
    app.sensors.add(app.monitor);

    return [
      ...app.sensors,
      app.producer,
      app.consumer,
      app.leaderAssignor,
      app.replyConsumer,
      ...app.agents.values(),
      app.topicRouter,
      app.tableManager,
      app.fetcher,
    ];
  }

  protected async onFirstStart(): Promise<void> {
    await this.app.createDirectories();

    if (this.app.agents.size === 0) {
      throw new ConfigurationError(
        'Attempting to start app that has no agents',
        appErrCodes.NoAgents,
        { appID: this.app.shortLabel },
      );
    }

    await this.app.onFirstStart();
  }

  protected async onStart(): Promise<void> {
    this.app.finalize();
    await this.app.onStart();
  }

  protected async onStarted(): Promise<void> {
    // A client-only graph leaves the table manager out, so nothing would
    // ever complete its recovery; waiting there would hang the start.
    if (!this.clientOnly) {
      this.logger.info('Waiting for table recovery');

      const stopped = await this.waitForStopped(
        this.app.tableManager.recoveryCompleted,
      );

      if (stopped) {
        this.logger.info(
          'Stopped while waiting for table recovery, not activating extras',
        );
        return;
      }
    }

    this.activateExtraTasks();
    await this.activateExtraServices();

    if (this.app.onStartupFinished) {
      await this.app.onStartupFinished();
    }

    await this.app.onStarted();
  }

  protected async onStop(): Promise<void> {
    await this.app.onStop();
  }

  protected async onShutdown(): Promise<void> {
    await this.app.onShutdown();
  }

  protected async onRestart(): Promise<void> {
    await this.app.onRestart();
  }

  private activateExtraTasks(): void {
    const app = this.app;

    app.extraTasks.forEach((task, index) => {
      const name = task.name || `extra-task-${index + 1}`;

      this.addBackgroundTask(name, () =>
        isZeroArgTask(task) ? task() : task(app),
      );
    });
  }
}
