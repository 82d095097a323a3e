import { ulid } from 'ulid';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { EventEmitterProtected } from '../event-emitter';
import { CompletionSignal } from '../completion-signal';
import { KEBAB_CASE_PATTERN } from '../constants';
import { toError } from '../to-error';
import { Beacon } from './beacon';
import { DependencyGraph } from './dependency-graph';
import { SchedulingContext } from './scheduling-context';
import type { BackgroundTaskOutcome, LifecycleNodeEventMap } from './events';
import { LifecycleNodeEvents } from './events';
import {
  BackgroundTaskError,
  ContextAffinityError,
  InvalidNodeNameError,
  LifecycleStateError,
  NodeStartupError,
  NodeStopTimeoutError,
} from './errors';
import type {
  BackgroundTaskInfo,
  BackgroundWork,
  FailureKind,
  FailureReport,
  LifecycleNodeOptions,
  NodeState,
  SupervisedNode,
} from './types';
import { NODE_STATE_TRANSITIONS, RUNNING_STATES } from './types';

const STARTABLE_STATES: readonly NodeState[] = [
  'init',
  'stopped',
  'crashed',
  'restarting',
];

interface TrackedTask {
  info: BackgroundTaskInfo;
  promise: Promise<void>;
}

/**
 * A restartable unit of a supervision tree.
 *
 * A node owns an ordered set of child nodes (its dependency graph), starts
 * them one after another before declaring itself started, and stops them in
 * the exact reverse order. Subclasses customize behavior through the
 * protected hooks, all of which default to no-ops.
 *
 * Start sequence: resolve and adopt children, `onFirstStart` (once per
 * lifetime), each child in order, `onStart`, state `started`, `onStarted`.
 *
 * Stop sequence: stop signal, `onStop`, background task cancellation, each
 * child in reverse order, `onShutdown`, state `stopped`.
 *
 * @example
 * ```typescript
 * class Consumer extends LifecycleNode {
 *   constructor(logger: Logger, private readonly fetcher: Fetcher) {
 *     super({ name: 'consumer', logger });
 *   }
 *
 *   protected resolveDependencies() {
 *     return [this.fetcher];
 *   }
 *
 *   protected async onStarted() {
 *     this.addBackgroundTask('commit-offsets', async (signal) => {
 *       while (!signal.aborted) {
 *         await this.commit();
 *         await sleep(5000, signal);
 *       }
 *     });
 *   }
 * }
 * ```
 */
export abstract class LifecycleNode
  extends EventEmitterProtected<LifecycleNodeEventMap>
  implements SupervisedNode
{
  /** Unique id of this instance (diagnostics) */
  public readonly id: string = ulid();

  /** Node name (kebab-case) */
  public readonly name: string;

  public readonly beacon: Beacon;

  /** Deadline for each child's stop, 0 waits indefinitely */
  public readonly stopTimeoutMS: number;

  /** How long a stop waits for cancelled background tasks to settle */
  public readonly taskCancelTimeoutMS: number;

  /** Node logger (scoped to the node name) */
  protected readonly logger: LoggerService;

  /** Root logger, handed to nodes this one creates */
  protected readonly rootLogger: Logger;

  private readonly graph = new DependencyGraph<LifecycleNode>();
  private readonly nodeEvents: LifecycleNodeEvents;
  private readonly tasks = new Map<string, TrackedTask>();

  private _state: NodeState = 'init';
  private _context: SchedulingContext | null;

  // Persistent across restarts
  private _hasCompletedFirstStart = false;
  private _crashReason: Error | null = null;

  // Reset at every start
  private stopSignal = new CompletionSignal();
  private abortController = new AbortController();
  private stopRequested = false;
  private startingChild: LifecycleNode | null = null;

  private runGeneration = 0;

  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;

  /**
   * @throws {InvalidNodeNameError} If the name isn't kebab-case
   */
  constructor(options: LifecycleNodeOptions) {
    super();

    if (!KEBAB_CASE_PATTERN.test(options.name)) {
      throw new InvalidNodeNameError({ name: options.name });
    }

    this.name = options.name;
    this.rootLogger = options.logger;
    this.logger = this.rootLogger.service(this.name);
    this._context = options.context ?? null;
    this.beacon = options.beacon ? options.beacon.new(this) : new Beacon(this);
    this.stopTimeoutMS = Math.max(options.stopTimeoutMS ?? 0, 0);
    this.taskCancelTimeoutMS = Math.max(options.taskCancelTimeoutMS ?? 1000, 0);
    this.nodeEvents = new LifecycleNodeEvents(this.name, (event, data) => {
      this.emit(event, data);
    });
  }

  // ============================================================================
  // Identity and state
  // ============================================================================

  public get label(): string {
    return this.name;
  }

  public get shortLabel(): string {
    return this.name;
  }

  public get state(): NodeState {
    return this._state;
  }

  public get isRunning(): boolean {
    return RUNNING_STATES.includes(this._state);
  }

  public get context(): SchedulingContext | null {
    return this._context;
  }

  public get hasCompletedFirstStart(): boolean {
    return this._hasCompletedFirstStart;
  }

  /** The error of the most recent crash, kept across restarts */
  public get crashReason(): Error | null {
    return this._crashReason;
  }

  /**
   * Aborts when the current run stops. Background work should observe it.
   */
  public get runSignal(): AbortSignal {
    return this.abortController.signal;
  }

  /** True once a stop was requested for the current run */
  public get shouldStop(): boolean {
    return this.stopRequested || this.stopSignal.hasResolved;
  }

  /** Children in start order: static first, then runtime ones */
  public get dependencies(): LifecycleNode[] {
    return this.graph.startOrder();
  }

  public get runtimeDependencies(): readonly LifecycleNode[] {
    return this.graph.runtimeDependencies;
  }

  public get backgroundTasks(): BackgroundTaskInfo[] {
    return [...this.tasks.values()].map(({ info }) => ({ ...info }));
  }

  /**
   * Bind this node to a scheduling context.
   *
   * @throws {ContextAffinityError} If the node is running in another context
   */
  public bindContext(context: SchedulingContext): void {
    if (this._context === context) {
      return;
    }

    if (this.isRunning) {
      throw new ContextAffinityError({
        nodeName: this.name,
        contextID: context.id,
      });
    }

    this._context = context;
  }

  // ============================================================================
  // Hooks
  // ============================================================================

  /**
   * Children of this node, in start order. Called at every start.
   */
  protected resolveDependencies(): Iterable<LifecycleNode> {
    return [];
  }

  /** Runs once in the node's lifetime, before any child starts */
  protected onFirstStart(): Promise<void> | void {}

  /** Runs at every start, after every child started */
  protected onStart(): Promise<void> | void {}

  /** Runs after the node reached `started` */
  protected onStarted(): Promise<void> | void {}

  /** Runs first when stopping, before children stop. Failures are logged. */
  protected onStop(): Promise<void> | void {}

  /** Runs last when stopping, after children stopped. Failures are logged. */
  protected onShutdown(): Promise<void> | void {}

  /** Runs before the stop of a restart. Failures are logged. */
  protected onRestart(): Promise<void> | void {}

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Start this node and its children. Concurrent callers share one start.
   *
   * @throws {LifecycleStateError} If the node is started or stopping
   * @throws {NodeStartupError} If a child failed to start
   */
  public start(): Promise<void> {
    if (this.startPromise) {
      return this.startPromise;
    }

    if (!STARTABLE_STATES.includes(this._state)) {
      return Promise.reject(
        new LifecycleStateError({
          nodeName: this.name,
          operation: 'start',
          state: this._state,
        }),
      );
    }

    const promise: Promise<void> = this.runStart().finally(() => {
      // A stop during onStarted already released this start
      if (this.startPromise === promise) {
        this.startPromise = null;
      }
    });

    this.startPromise = promise;
    return promise;
  }

  /**
   * Start the node unless it is already started or starting.
   *
   * @returns true if this call started the node
   */
  public async maybeStart(): Promise<boolean> {
    if (this._state === 'started') {
      return false;
    }

    if (this.startPromise) {
      await this.startPromise;
      return false;
    }

    await this.start();
    return true;
  }

  /**
   * Stop this node and its children. Concurrent callers share one stop.
   *
   * Stopping a node that is still starting aborts the start: no further
   * child is launched and the ones already started are stopped again.
   */
  public async stop(): Promise<void> {
    if (this.stopPromise) {
      return this.stopPromise;
    }

    switch (this._state) {
      case 'init':
      case 'stopped':
        return;
      case 'restarting':
        throw new LifecycleStateError({
          nodeName: this.name,
          operation: 'stop',
          state: this._state,
        });
      case 'starting':
        this.stopPromise = this.abortStart().finally(() => {
          this.stopPromise = null;
        });
        return this.stopPromise;
      default:
        this.stopPromise = this.runStop().finally(() => {
          this.stopPromise = null;
        });
        return this.stopPromise;
    }
  }

  /**
   * Stop, then start again. `onFirstStart` does not run a second time.
   */
  public async restart(): Promise<void> {
    this.logger.info('Restarting');

    await this.runBestEffort('onRestart', () => this.onRestart());
    await this.stop();
    this.setState('restarting');
    await this.start();
  }

  /**
   * Mark a running node as crashed and report the failure to its
   * supervisor. Nothing is torn down; a restart or stop recovers it.
   *
   * @throws {LifecycleStateError} If the node isn't running
   */
  public crash(error: unknown): void {
    if (!this.isRunning) {
      throw new LifecycleStateError({
        nodeName: this.name,
        operation: 'crash',
        state: this._state,
      });
    }

    this.markCrashed(toError(error), 'crash');
  }

  /**
   * Add a child while the node runs. It is started right away when this
   * node is started, otherwise with the next start, and it stops before
   * every static child. A failed start is reported, not thrown.
   *
   * @returns false if the child is already part of this node's graph
   */
  public async addRuntimeDependency(child: LifecycleNode): Promise<boolean> {
    if (this.graph.has(child)) {
      return false;
    }

    this.adopt(child, this.ensureContext());
    this.graph.addRuntime(child);
    this.nodeEvents.dependencyAdded(child.name);

    if (this._state === 'started') {
      try {
        await child.maybeStart();
      } catch (error) {
        const failure = new BackgroundTaskError(
          { nodeName: this.name, taskName: child.name },
          toError(error),
        );

        this.logger
          .entity(child.name)
          .errorObject('Runtime dependency failed to start', failure);
        this.reportFailure('runtime-dependency', failure);
      }
    }

    return true;
  }

  /**
   * Run `work` in the background for as long as this run lasts.
   *
   * The signal passed to `work` aborts when the node stops. A failure that
   * isn't caused by that abort is reported as a `BackgroundTaskError`; the
   * node keeps running.
   */
  public addBackgroundTask(
    name: string,
    work: BackgroundWork,
  ): BackgroundTaskInfo {
    const info: BackgroundTaskInfo = {
      id: ulid(),
      name,
      startedAt: Date.now(),
    };

    const promise = this.runBackgroundTask(
      info,
      work,
      this.abortController.signal,
    );

    this.tasks.set(info.id, { info, promise });
    this._context?.track(name, promise);

    return { ...info };
  }

  /**
   * Called by the beacons of descendants
   */
  public receiveFailureReport(report: FailureReport): void {
    this.logger.warn('{{origin}} reported a {{kind}} failure: {{message}}', {
      params: {
        origin: report.origin,
        kind: report.kind,
        message: report.error.message,
      },
    });

    this.nodeEvents.failure(report);
    this.beacon.reportToParent(report);
  }

  // ============================================================================
  // Helpers for subclasses
  // ============================================================================

  /**
   * Wait for `awaitable`, unless the node is stopped first.
   *
   * @returns true if the node stopped (or crashed) before `awaitable` settled
   */
  protected async waitForStopped(
    awaitable: PromiseLike<unknown>,
  ): Promise<boolean> {
    if (this.shouldStop) {
      return true;
    }

    return Promise.race([
      this.stopSignal.promise.then(() => true),
      Promise.resolve(awaitable).then(() => false),
    ]);
  }

  /**
   * Abort the run signal and wait (bounded by `taskCancelTimeoutMS`) for
   * background tasks to settle.
   */
  protected async cancelBackgroundTasks(): Promise<void> {
    this.abortController.abort();

    if (this.tasks.size === 0) {
      return;
    }

    const pending = [...this.tasks.values()];
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    const result = await Promise.race([
      Promise.allSettled(pending.map(({ promise }) => promise)).then(
        () => 'settled' as const,
      ),
      new Promise<'timeout'>((resolve) => {
        timeoutHandle = setTimeout(() => {
          resolve('timeout');
        }, this.taskCancelTimeoutMS);
      }),
    ]);

    clearTimeout(timeoutHandle);

    if (result === 'timeout') {
      this.logger.warn(
        '{{count}} background task(s) still running {{timeoutMS}}ms after cancellation: {{names}}',
        {
          params: {
            count: this.tasks.size,
            timeoutMS: this.taskCancelTimeoutMS,
            names: [...this.tasks.values()].map(({ info }) => info.name),
          },
        },
      );
    }
  }

  protected reportFailure(kind: FailureKind, error: Error): void {
    const report: FailureReport = {
      kind,
      origin: this.label,
      path: this.beacon.path(),
      error,
      timestamp: Date.now(),
    };

    this.nodeEvents.failure(report);
    this.beacon.reportToParent(report);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async runStart(): Promise<void> {
    this.resetRunState();
    const generation = this.runGeneration;
    this.setState('starting');
    this.logger.info('Starting');

    const started: LifecycleNode[] = [];

    try {
      const context = this.ensureContext();

      this.graph.setStatic(this.resolveDependencies());

      for (const child of this.graph.startOrder()) {
        this.adopt(child, context);
      }

      if (!this._hasCompletedFirstStart) {
        await this.onFirstStart();
        this._hasCompletedFirstStart = true;
      }

      for (const child of this.graph.startOrder()) {
        // stop() or crash() arrived while a previous child was starting
        if (this.stopRequested) {
          break;
        }

        this.startingChild = child;

        try {
          if (await child.maybeStart()) {
            started.push(child);
          }
        } catch (error) {
          throw new NodeStartupError(
            { nodeName: this.name, dependencyName: child.name },
            toError(error),
          );
        } finally {
          this.startingChild = null;
        }
      }

      if (!this.stopRequested) {
        await this.onStart();
      }

      if (this._state === 'crashed') {
        throw this._crashReason ?? new Error(`Node "${this.name}" crashed`);
      }

      if (this.stopRequested) {
        this.logger.info('Stop requested while starting, rolling back');
        await this.rollback(started);
        this.setState('stopped');
        return;
      }

      this.setState('started');
      this.logger.success('Started');

      await this.onStarted();
    } catch (error) {
      const failure = toError(error);

      // onStarted outlived its run; a later start owns the children now
      if (generation !== this.runGeneration) {
        throw failure;
      }

      await this.rollback(started);

      if (this.isRunning) {
        this.markCrashed(failure, 'startup');
      }

      throw failure;
    }
  }

  private async abortStart(): Promise<void> {
    this.stopRequested = true;
    this.stopSignal.resolveOnce();
    this.abortController.abort();

    // A child can hold the start open (e.g. waiting on a barrier)
    const child = this.startingChild;

    if (child) {
      await this.stopChild(child);
    }

    const inFlight = this.startPromise;

    if (inFlight) {
      try {
        await inFlight;
      } catch (error) {
        this.logger.debug('Start failed after stop was requested: {{message}}', {
          params: { message: toError(error).message },
        });
      }
    }
  }

  private async runStop(): Promise<void> {
    this.setState('stopping');
    this.logger.info('Stopping');

    // The start is over once its node stops, even if onStarted hasn't returned
    this.startPromise = null;

    this.stopRequested = true;
    this.stopSignal.resolveOnce();

    await this.runBestEffort('onStop', () => this.onStop());
    await this.cancelBackgroundTasks();

    for (const child of this.graph.stopOrder()) {
      await this.stopChild(child);
    }

    await this.runBestEffort('onShutdown', () => this.onShutdown());

    // crash() may have been called while stopping
    if (this._state === 'stopping') {
      this.setState('stopped');
      this.logger.success('Stopped');
    }
  }

  private async stopChild(child: LifecycleNode): Promise<void> {
    const childStop = child.stop();

    try {
      if (this.stopTimeoutMS <= 0) {
        await childStop;
        return;
      }

      let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

      const result = await Promise.race([
        childStop.then(() => 'stopped' as const),
        new Promise<'timeout'>((resolve) => {
          timeoutHandle = setTimeout(() => {
            resolve('timeout');
          }, this.stopTimeoutMS);
        }),
      ]);

      clearTimeout(timeoutHandle);

      if (result === 'timeout') {
        const error = new NodeStopTimeoutError({
          nodeName: child.name,
          timeoutMS: this.stopTimeoutMS,
        });

        this.logger.entity(child.name).warn(error.message);
        this.nodeEvents.stopTimeout(child.name, this.stopTimeoutMS);
        child.markCrashed(error, 'stop-timeout');
      }
    } catch (error) {
      this.logger.entity(child.name).errorObject('Failed to stop', error);
    }
  }

  /**
   * Stop what this run started, in stop order. Runtime children added while
   * the run was already `started` (e.g. from onStarted) are included.
   */
  private async rollback(started: LifecycleNode[]): Promise<void> {
    await this.cancelBackgroundTasks();

    const startedHere = new Set(started);
    const runtime = new Set(this.graph.runtimeDependencies);

    for (const child of this.graph.stopOrder()) {
      const isLiveRuntimeChild =
        runtime.has(child) && (child.isRunning || child.state === 'crashed');

      if (!startedHere.has(child) && !isLiveRuntimeChild) {
        continue;
      }

      this.nodeEvents.startupRollback(child.name);
      await this.stopChild(child);
    }
  }

  private markCrashed(error: Error, kind: FailureKind): void {
    if (this.isRunning) {
      this.setState('crashed');
    }

    this._crashReason = error;
    this.stopRequested = true;
    this.stopSignal.resolveOnce();
    this.abortController.abort();
    this.logger.errorObject(
      kind === 'startup' ? 'Failed to start' : 'Crashed',
      error,
    );
    this.reportFailure(kind, error);
  }

  private async runBackgroundTask(
    info: BackgroundTaskInfo,
    work: BackgroundWork,
    signal: AbortSignal,
  ): Promise<void> {
    const taskLogger = this.logger.entity(info.name);
    let outcome: BackgroundTaskOutcome = 'completed';

    this.nodeEvents.taskStarted(info.id, info.name);

    try {
      await work(signal);

      if (signal.aborted) {
        outcome = 'cancelled';
      }
    } catch (error) {
      if (signal.aborted) {
        outcome = 'cancelled';
        taskLogger.debug('Background task ended after cancellation');
      } else {
        outcome = 'failed';

        const failure = new BackgroundTaskError(
          { nodeName: this.name, taskName: info.name },
          toError(error),
        );

        taskLogger.errorObject('Background task failed', failure);
        this.reportFailure('background-task', failure);
      }
    } finally {
      this.tasks.delete(info.id);
      this.nodeEvents.taskFinished({
        taskID: info.id,
        taskName: info.name,
        outcome,
        durationMS: Date.now() - info.startedAt,
      });
    }
  }

  private adopt(child: LifecycleNode, context: SchedulingContext): void {
    child.beacon.reattach(this.beacon);
    child.bindContext(context);
  }

  private ensureContext(): SchedulingContext {
    if (!this._context) {
      this._context = new SchedulingContext(this.label);
    }

    return this._context;
  }

  private resetRunState(): void {
    this.runGeneration++;
    this.stopSignal = new CompletionSignal();
    this.abortController = new AbortController();
    this.stopRequested = false;
    this.startingChild = null;
  }

  private async runBestEffort(
    hookName: string,
    hook: () => Promise<void> | void,
  ): Promise<void> {
    try {
      await hook();
    } catch (error) {
      this.logger.errorObject(`${hookName} failed`, error);
    }
  }

  private setState(to: NodeState): void {
    const from = this._state;

    if (!NODE_STATE_TRANSITIONS[from].includes(to)) {
      throw new LifecycleStateError({
        nodeName: this.name,
        operation: `move to ${to}`,
        state: from,
      });
    }

    this._state = to;
    this.logger.debug('State {{from}} -> {{to}}', { params: { from, to } });
    this.nodeEvents.stateChanged(from, to);
  }
}
