import type { Logger } from '../logger';
import { CompletionSignal } from '../completion-signal';
import { LifecycleNode } from '../supervision/lifecycle-node';
import type { LifecycleNodeOptions } from '../supervision/types';
import type { TableManagerNode } from './types';

/**
 * Placeholder for a collaborator the application doesn't provide.
 *
 * Runs the lifecycle and nothing else, so an application can be declared
 * and started without a broker connection behind it.
 */
export class InertNode extends LifecycleNode {}

export interface InertTableManagerOptions
  extends Omit<LifecycleNodeOptions, 'name'> {
  name?: string;

  /** Complete recovery as soon as the node started (default true) */
  recoverOnStart?: boolean;
}

/**
 * Table manager without tables. Each run gets a fresh recovery barrier,
 * completed on start or by `markRecovered()`.
 */
export class InertTableManager extends LifecycleNode implements TableManagerNode {
  private readonly recoverOnStart: boolean;
  private recovery = new CompletionSignal();

  constructor(options: InertTableManagerOptions) {
    super({ ...options, name: options.name ?? 'table-manager' });
    this.recoverOnStart = options.recoverOnStart ?? true;
  }

  public get recoveryCompleted(): Promise<void> {
    return this.recovery.promise;
  }

  public get isRecovered(): boolean {
    return this.recovery.hasResolved;
  }

  public markRecovered(): void {
    if (!this.recovery.hasResolved) {
      this.logger.info('Recovery completed');
    }

    this.recovery.resolveOnce();
  }

  protected onStart(): void {
    if (this.recovery.hasResolved) {
      this.recovery = new CompletionSignal();
    }
  }

  protected onStarted(): void {
    if (this.recoverOnStart) {
      this.markRecovered();
    }
  }
}

/**
 * The built-in sensor. It reports the state of every node in its tree and
 * counts the failure reports that reach its parent.
 */
export class Monitor extends LifecycleNode {
  private _failureCount = 0;
  private _startedAt: number | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(logger: Logger) {
    super({ name: 'monitor', logger });
  }

  public get failureCount(): number {
    return this._failureCount;
  }

  /** Milliseconds since the monitor last started, null when not started */
  public get uptimeMS(): number | null {
    return this._startedAt === null ? null : Date.now() - this._startedAt;
  }

  /** State of every node in the monitored tree, by label */
  public snapshot(): Record<string, string> {
    const states: Record<string, string> = {};

    for (const beacon of this.beacon.root.walk()) {
      states[beacon.node.label] = beacon.node.state;
    }

    return states;
  }

  protected onStart(): void {
    this._startedAt = Date.now();

    const parent = this.beacon.parent?.node;

    if (parent instanceof LifecycleNode) {
      this.unsubscribe = parent.on('node:failure', () => {
        this._failureCount++;
      });
    }
  }

  protected onShutdown(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this._startedAt = null;
  }
}
