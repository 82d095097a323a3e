import type { LifecycleNode } from '../supervision/lifecycle-node';
import type { NodeState } from '../supervision/types';

/**
 * Defers construction of a node until its first lifecycle use.
 *
 * Declaring an application must not create its orchestrator (or the
 * scheduling context the orchestrator binds to). The proxy builds it on
 * the first `start()`, or on the first access to `service`.
 */
export class LazyProxy<T extends LifecycleNode> {
  private readonly factory: () => T;
  private instance: T | null = null;

  constructor(factory: () => T) {
    this.factory = factory;
  }

  public get isMaterialized(): boolean {
    return this.instance !== null;
  }

  /** The node, constructed on first access */
  public get service(): T {
    if (!this.instance) {
      this.instance = this.factory();
    }

    return this.instance;
  }

  /** `init` while nothing has been constructed */
  public get state(): NodeState {
    return this.instance?.state ?? 'init';
  }

  public start(): Promise<void> {
    return this.service.start();
  }

  public maybeStart(): Promise<boolean> {
    return this.service.maybeStart();
  }

  public restart(): Promise<void> {
    return this.service.restart();
  }

  /**
   * Stopping a node that was never constructed does nothing
   */
  public async stop(): Promise<void> {
    await this.instance?.stop();
  }

  public crash(error: unknown): void {
    this.service.crash(error);
  }
}
