/**
 * Test nodes for supervision unit tests and application tests
 *
 * They record every hook they run into a shared journal, so tests can
 * assert the exact interleaving of hooks across a whole tree.
 */

import type { Logger } from '../logger';
import { CompletionSignal } from '../completion-signal';
import { sleep } from '../sleep';
import type { Beacon } from './beacon';
import { LifecycleNode } from './lifecycle-node';
import type { SchedulingContext } from './scheduling-context';

/**
 * Ordered record of `<node>:<hook>` entries
 */
export class CallJournal {
  public readonly entries: string[] = [];

  public record(entry: string): void {
    this.entries.push(entry);
  }

  /** Entries for one hook, e.g. `of('start')` -> ['producer', 'consumer'] */
  public of(hook: string): string[] {
    const suffix = `:${hook}`;

    return this.entries
      .filter((entry) => entry.endsWith(suffix))
      .map((entry) => entry.slice(0, -suffix.length));
  }

  public clear(): void {
    this.entries.length = 0;
  }
}

export interface RecordingNodeOptions {
  name: string;
  logger: Logger;
  journal?: CallJournal;
  children?: LifecycleNode[];
  context?: SchedulingContext;
  beacon?: Beacon;
  stopTimeoutMS?: number;
  taskCancelTimeoutMS?: number;

  /** Thrown from onStart */
  failOnStart?: Error;

  /** Thrown from onFirstStart */
  failOnFirstStart?: Error;

  /** Thrown from onStop (logged, never stops the teardown) */
  failOnStop?: Error;

  startDelayMS?: number;

  /** onStop waits until `releaseStop()` is called */
  holdStop?: boolean;

  /** onStarted waits until `releaseStarted()` is called */
  holdStarted?: boolean;

  /** Thrown from onStarted */
  failOnStarted?: Error;

  /** Added as runtime dependencies from onStarted */
  startedChildren?: LifecycleNode[];
}

/**
 * Node that records its hooks and can be told to fail or stall
 */
export class RecordingNode extends LifecycleNode {
  public readonly journal: CallJournal;
  public children: LifecycleNode[];

  public failOnStart?: Error;
  public failOnFirstStart?: Error;
  public failOnStop?: Error;
  public failOnStarted?: Error;
  public startedChildren: LifecycleNode[];

  private readonly startDelayMS: number;
  private readonly holdStop: boolean;
  private readonly holdStarted: boolean;
  private stopRelease = new CompletionSignal();
  private startedRelease = new CompletionSignal();

  constructor(options: RecordingNodeOptions) {
    super({
      name: options.name,
      logger: options.logger,
      context: options.context,
      beacon: options.beacon,
      stopTimeoutMS: options.stopTimeoutMS,
      taskCancelTimeoutMS: options.taskCancelTimeoutMS,
    });

    this.journal = options.journal ?? new CallJournal();
    this.children = options.children ?? [];
    this.failOnStart = options.failOnStart;
    this.failOnFirstStart = options.failOnFirstStart;
    this.failOnStop = options.failOnStop;
    this.startDelayMS = options.startDelayMS ?? 0;
    this.holdStop = options.holdStop ?? false;
    this.holdStarted = options.holdStarted ?? false;
    this.failOnStarted = options.failOnStarted;
    this.startedChildren = options.startedChildren ?? [];
  }

  public releaseStop(): void {
    this.stopRelease.resolveOnce();
  }

  public releaseStarted(): void {
    this.startedRelease.resolveOnce();
  }

  /** Exposes the protected barrier helper to tests */
  public waitFor(awaitable: PromiseLike<unknown>): Promise<boolean> {
    return this.waitForStopped(awaitable);
  }

  protected resolveDependencies(): LifecycleNode[] {
    return this.children;
  }

  protected onFirstStart(): void {
    this.journal.record(`${this.name}:first-start`);

    if (this.failOnFirstStart) {
      throw this.failOnFirstStart;
    }
  }

  protected async onStart(): Promise<void> {
    if (this.startDelayMS > 0) {
      await sleep(this.startDelayMS);
    }

    this.journal.record(`${this.name}:start`);

    if (this.failOnStart) {
      throw this.failOnStart;
    }
  }

  protected async onStarted(): Promise<void> {
    this.journal.record(`${this.name}:started`);

    for (const child of this.startedChildren) {
      await this.addRuntimeDependency(child);
    }

    if (this.holdStarted) {
      await this.startedRelease.promise;
      this.startedRelease = new CompletionSignal();
      this.journal.record(`${this.name}:started-released`);
    }

    if (this.failOnStarted) {
      throw this.failOnStarted;
    }
  }

  protected async onStop(): Promise<void> {
    this.journal.record(`${this.name}:stop`);

    if (this.holdStop) {
      await this.stopRelease.promise;
      this.stopRelease = new CompletionSignal();
    }

    if (this.failOnStop) {
      throw this.failOnStop;
    }
  }

  protected onShutdown(): void {
    this.journal.record(`${this.name}:shutdown`);
  }

  protected onRestart(): void {
    this.journal.record(`${this.name}:restart`);
  }
}

/**
 * Node whose onStarted waits on an external barrier, like the orchestrator
 * waiting for table recovery
 */
export class BarrierNode extends RecordingNode {
  public readonly barrier = new CompletionSignal();
  public interrupted: boolean | null = null;

  protected async onStarted(): Promise<void> {
    await super.onStarted();
    this.interrupted = await this.waitForStopped(this.barrier.promise);
    this.journal.record(
      `${this.name}:${this.interrupted ? 'barrier-interrupted' : 'barrier-passed'}`,
    );
  }
}
