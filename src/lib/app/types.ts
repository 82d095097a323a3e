import type { Logger } from '../logger';
import type { LifecycleNode } from '../supervision/lifecycle-node';
import type { SchedulingContext } from '../supervision/scheduling-context';
import type { ServiceSpawnOptions } from '../supervision/types';

/**
 * The table manager owns the recovery barrier: it settles once every
 * table has caught up with its changelog.
 */
export interface TableManagerNode extends LifecycleNode {
  readonly recoveryCompleted: PromiseLike<void>;
}

/** An extra task that takes no arguments */
export type ZeroArgTask = () => PromiseLike<unknown>;

/** An extra task that receives the application */
export type AppTask<TApp> = (app: TApp) => PromiseLike<unknown>;

/**
 * Long-running work started once the application is fully started.
 * Dispatched on its declared parameter count.
 */
export type ExtraTask<TApp> = ZeroArgTask | AppTask<TApp>;

/** A service class the orchestrator instantiates itself */
export type ServiceClass = new (options: ServiceSpawnOptions) => LifecycleNode;

/** A service instance, used as is, or a class to instantiate */
export type ExtraServiceEntry = LifecycleNode | ServiceClass;

export type AppHook = () => Promise<void> | void;

/** Declared parameter count, as `Function.length` reports it */
export function isZeroArgTask<TApp>(task: ExtraTask<TApp>): task is ZeroArgTask {
  return task.length === 0;
}

export function isServiceClass(entry: ExtraServiceEntry): entry is ServiceClass {
  return typeof entry === 'function';
}

/**
 * Everything the orchestrator needs from the application it runs.
 *
 * The orchestrator reads collaborators and registries from it, calls its
 * hooks at the matching points of its own lifecycle, and mutates exactly
 * one thing: it adds the monitor to `sensors`.
 */
export interface OrchestratedApp<TSelf> {
  readonly clientOnly: boolean;
  readonly schedulingContext: SchedulingContext;
  readonly logger: Logger;

  readonly monitor: LifecycleNode;
  readonly sensors: Set<LifecycleNode>;
  readonly agents: ReadonlyMap<string, LifecycleNode>;

  readonly producer: LifecycleNode;
  readonly consumer: LifecycleNode;
  readonly replyConsumer: LifecycleNode;
  readonly leaderAssignor: LifecycleNode;
  readonly topicRouter: LifecycleNode;
  readonly tableManager: TableManagerNode;
  readonly fetcher: LifecycleNode;

  readonly extraTasks: readonly ExtraTask<TSelf>[];
  readonly extraServices: readonly ExtraServiceEntry[];

  readonly label: string;
  readonly shortLabel: string;

  onFirstStart: AppHook;
  onStart: AppHook;
  onStarted: AppHook;
  onStop: AppHook;
  onShutdown: AppHook;
  onRestart: AppHook;

  /** Called once the extra tasks and services are live */
  onStartupFinished?: AppHook | null;

  createDirectories(): Promise<void> | void;

  /** Seal the configuration; registries reject changes afterwards */
  finalize(): void;
}
