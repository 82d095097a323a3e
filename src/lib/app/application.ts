import path from 'node:path';
import fs from 'node:fs/promises';
import { EventEmitterProtected } from '../event-emitter';
import { KEBAB_CASE_PATTERN } from '../constants';
import { sleep } from '../sleep';
import { Logger } from '../logger';
import { ConsoleSink } from '../logger/sinks';
import type { LoggerService } from '../logger/logger-service';
import type { LifecycleNode } from '../supervision/lifecycle-node';
import { SchedulingContext } from '../supervision/scheduling-context';
import type { NodeState } from '../supervision/types';
import { InertNode, InertTableManager, Monitor } from './components';
import { ConfigurationError, appErrCodes } from './errors';
import { LazyProxy } from './lazy-proxy';
import { Orchestrator } from './orchestrator';
import type {
  AppHook,
  AppTask,
  ExtraServiceEntry,
  ExtraTask,
  OrchestratedApp,
  TableManagerNode,
} from './types';
import { Web } from './web';
import type { WebOptions } from './web';

export interface ApplicationComponents {
  producer: LifecycleNode;
  consumer: LifecycleNode;
  replyConsumer: LifecycleNode;
  leaderAssignor: LifecycleNode;
  topicRouter: LifecycleNode;
  tableManager: TableManagerNode;
  fetcher: LifecycleNode;
}

export interface ApplicationOptions {
  /** Application id (kebab-case) */
  id: string;

  /** Only produce and receive replies: no agents, tables or sensors */
  clientOnly?: boolean;

  /** Directory for local state (default `<cwd>/<id>-data`) */
  dataDir?: string;

  /** Root logger (default: a Logger writing to the console) */
  logger?: Logger;

  /** Collaborators; the ones left out are inert placeholders */
  components?: Partial<ApplicationComponents>;

  /** The built-in sensor (default: a new Monitor) */
  monitor?: LifecycleNode;

  web?: WebOptions;

  /** Per-child stop deadline of the orchestrator, 0 waits indefinitely */
  stopTimeoutMS?: number;

  /** How long a stop waits for cancelled extra tasks */
  taskCancelTimeoutMS?: number;
}

export interface ApplicationEventMap {
  'app:first-start': undefined;
  'app:start': undefined;
  'app:started': undefined;
  'app:stop': undefined;
  'app:shutdown': undefined;
  'app:restart': undefined;
}

/**
 * A streaming application: its collaborators, its agents, sensors, extra
 * tasks and extra services, and the orchestrator that runs them.
 *
 * Declaring an application creates neither the orchestrator nor the
 * scheduling context; both appear on first lifecycle use.
 *
 * @example
 * ```typescript
 * const app = new Application({ id: 'orders' });
 *
 * app.agent(new OrderAgent({ name: 'process-orders', logger: app.logger }));
 *
 * app.timer(30_000, async (app) => {
 *   app.logger.info('Still alive');
 * });
 *
 * await app.start();
 * ```
 */
export class Application
  extends EventEmitterProtected<ApplicationEventMap>
  implements OrchestratedApp<Application>
{
  public readonly id: string;
  public readonly clientOnly: boolean;
  public readonly dataDir: string;
  public readonly logger: Logger;

  public readonly producer: LifecycleNode;
  public readonly consumer: LifecycleNode;
  public readonly replyConsumer: LifecycleNode;
  public readonly leaderAssignor: LifecycleNode;
  public readonly topicRouter: LifecycleNode;
  public readonly tableManager: TableManagerNode;
  public readonly fetcher: LifecycleNode;
  public readonly monitor: LifecycleNode;
  public readonly web: Web;

  public readonly sensors = new Set<LifecycleNode>();
  public onStartupFinished: AppHook | null = null;

  private readonly _agents = new Map<string, LifecycleNode>();
  private readonly _extraTasks: ExtraTask<Application>[] = [];
  private readonly _extraServices: ExtraServiceEntry[] = [];
  private readonly proxy: LazyProxy<Orchestrator<Application>>;
  private readonly appLogger: LoggerService;

  private _schedulingContext: SchedulingContext | null = null;
  private _isFinalized = false;

  /**
   * @throws {ConfigurationError} If the id isn't kebab-case
   */
  constructor(options: ApplicationOptions) {
    super();

    if (!KEBAB_CASE_PATTERN.test(options.id)) {
      throw new ConfigurationError(
        `Invalid application id: "${options.id}". Application ids must be kebab-case.`,
        appErrCodes.InvalidID,
        { appID: options.id },
      );
    }

    this.id = options.id;
    this.clientOnly = options.clientOnly ?? false;
    this.dataDir =
      options.dataDir ?? path.join(process.cwd(), `${this.id}-data`);
    this.logger =
      options.logger ?? new Logger({ sinks: [new ConsoleSink()] });
    this.appLogger = this.logger.service(this.id);

    const logger = this.logger;
    const components = options.components ?? {};

    this.producer =
      components.producer ?? new InertNode({ name: 'producer', logger });
    this.consumer =
      components.consumer ?? new InertNode({ name: 'consumer', logger });
    this.replyConsumer =
      components.replyConsumer ??
      new InertNode({ name: 'reply-consumer', logger });
    this.leaderAssignor =
      components.leaderAssignor ??
      new InertNode({ name: 'leader-assignor', logger });
    this.topicRouter =
      components.topicRouter ?? new InertNode({ name: 'topic-router', logger });
    this.tableManager =
      components.tableManager ?? new InertTableManager({ logger });
    this.fetcher =
      components.fetcher ?? new InertNode({ name: 'fetcher', logger });
    this.monitor = options.monitor ?? new Monitor(logger);
    this.web = new Web({ ...options.web, logger });

    this.proxy = new LazyProxy(
      () =>
        new Orchestrator<Application>(this, {
          stopTimeoutMS: options.stopTimeoutMS,
          taskCancelTimeoutMS: options.taskCancelTimeoutMS,
        }),
    );
  }

  // ============================================================================
  // Identity and state
  // ============================================================================

  public get label(): string {
    return `${this.constructor.name}: ${this.id}`;
  }

  public get shortLabel(): string {
    return this.constructor.name;
  }

  /** Created on first access */
  public get schedulingContext(): SchedulingContext {
    if (!this._schedulingContext) {
      this._schedulingContext = new SchedulingContext(this.id);
    }

    return this._schedulingContext;
  }

  public get hasSchedulingContext(): boolean {
    return this._schedulingContext !== null;
  }

  /** The orchestrator, constructed on first access */
  public get orchestrator(): Orchestrator<Application> {
    return this.proxy.service;
  }

  public get hasOrchestrator(): boolean {
    return this.proxy.isMaterialized;
  }

  public get state(): NodeState {
    return this.proxy.state;
  }

  /** Aborts when the orchestrator stops; extra tasks should observe it */
  public get runSignal(): AbortSignal {
    return this.orchestrator.runSignal;
  }

  public get isFinalized(): boolean {
    return this._isFinalized;
  }

  public get agents(): ReadonlyMap<string, LifecycleNode> {
    return this._agents;
  }

  public get extraTasks(): readonly ExtraTask<Application>[] {
    return this._extraTasks;
  }

  public get extraServices(): readonly ExtraServiceEntry[] {
    return this._extraServices;
  }

  public get tablesDir(): string {
    return path.join(this.dataDir, 'tables');
  }

  // ============================================================================
  // Registration (closed by finalize)
  // ============================================================================

  /**
   * Register an agent, keyed by its node name
   */
  public agent<T extends LifecycleNode>(node: T): T {
    this.assertOpen(node.name);

    if (this._agents.has(node.name)) {
      throw new ConfigurationError(
        `Agent already registered: ${node.name}`,
        appErrCodes.DuplicateRegistration,
        { appID: this.id, name: node.name },
      );
    }

    this._agents.set(node.name, node);
    return node;
  }

  public sensor<T extends LifecycleNode>(node: T): T {
    this.assertOpen(node.name);

    if (this.sensors.has(node)) {
      throw new ConfigurationError(
        `Sensor already registered: ${node.name}`,
        appErrCodes.DuplicateRegistration,
        { appID: this.id, name: node.name },
      );
    }

    this.sensors.add(node);
    return node;
  }

  /**
   * Register an extra task, started once the application is fully started.
   * A task declaring a parameter receives the application.
   *
   * The count is the function's `length`, which stops at the first
   * parameter with a default and leaves rest parameters out: a task written
   * as `(app = fallback) => ...` or `(...args) => ...` is called with no
   * arguments. Declare the parameter plainly to receive the application.
   */
  public task<T extends ExtraTask<Application>>(task: T): T {
    this.assertOpen(task.name);

    if (this._extraTasks.includes(task)) {
      throw new ConfigurationError(
        `Task already registered: ${task.name || '(anonymous)'}`,
        appErrCodes.DuplicateRegistration,
        { appID: this.id, name: task.name },
      );
    }

    this._extraTasks.push(task);
    return task;
  }

  /**
   * Register an extra task that calls `fn` every `intervalMS` until the
   * application stops. The first call happens after one interval.
   */
  public timer(intervalMS: number, fn: AppTask<Application>): ExtraTask<Application> {
    const timer = async (): Promise<void> => {
      const signal = this.runSignal;

      while (!signal.aborted) {
        await sleep(intervalMS, signal);

        if (signal.aborted) {
          break;
        }

        await fn(this);
      }
    };

    return this.task(timer);
  }

  /**
   * Register an extra service: an instance, or a class the orchestrator
   * instantiates with its logger, scheduling context and beacon
   */
  public service<T extends ExtraServiceEntry>(entry: T): T {
    this.assertOpen(entry.name);

    if (this._extraServices.includes(entry)) {
      throw new ConfigurationError(
        `Service already registered: ${entry.name}`,
        appErrCodes.DuplicateRegistration,
        { appID: this.id, name: entry.name },
      );
    }

    this._extraServices.push(entry);
    return entry;
  }

  /**
   * Seal the configuration. Idempotent.
   */
  public finalize(): void {
    if (this._isFinalized) {
      return;
    }

    this._isFinalized = true;
    this.appLogger.debug(
      'Finalized with {{agents}} agent(s), {{sensors}} sensor(s), {{tasks}} task(s) and {{services}} service(s)',
      {
        params: {
          agents: this._agents.size,
          sensors: this.sensors.size,
          tasks: this._extraTasks.length,
          services: this._extraServices.length,
        },
      },
    );
  }

  public async createDirectories(): Promise<void> {
    await fs.mkdir(this.tablesDir, { recursive: true });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  public start(): Promise<void> {
    return this.proxy.start();
  }

  public stop(): Promise<void> {
    return this.proxy.stop();
  }

  public restart(): Promise<void> {
    return this.proxy.restart();
  }

  // ============================================================================
  // Hooks called by the orchestrator (override to customize)
  // ============================================================================

  public async onFirstStart(): Promise<void> {
    this.emit('app:first-start', undefined);
  }

  public async onStart(): Promise<void> {
    this.emit('app:start', undefined);
  }

  public async onStarted(): Promise<void> {
    this.emit('app:started', undefined);
  }

  public async onStop(): Promise<void> {
    this.emit('app:stop', undefined);
  }

  public async onShutdown(): Promise<void> {
    this.emit('app:shutdown', undefined);
  }

  public async onRestart(): Promise<void> {
    this.emit('app:restart', undefined);
  }

  private assertOpen(name: string): void {
    if (this._isFinalized) {
      throw new ConfigurationError(
        `Cannot register "${name}": application ${this.id} is already finalized`,
        appErrCodes.RegistrationClosed,
        { appID: this.id, name },
      );
    }
  }
}
