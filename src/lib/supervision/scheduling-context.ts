import { ulid } from 'ulid';

export interface SchedulingContextDescription {
  id: string;
  label: string;
  createdAt: number;
  activeTaskCount: number;
}

/**
 * The shared execution context a supervision tree is bound to.
 *
 * Every node of one application tree holds the same context, and a running
 * node is never rebound to another one. The context also counts the
 * background work scheduled on it, which the tree report and tests use to
 * check that a stop left nothing behind.
 */
export class SchedulingContext {
  public readonly id: string = ulid();
  public readonly label: string;
  public readonly createdAt: number = Date.now();

  private active = new Map<string, string>();

  constructor(label = 'default') {
    this.label = label;
  }

  public get activeTaskCount(): number {
    return this.active.size;
  }

  /**
   * Names of the tasks that have not settled yet
   */
  public get activeTaskNames(): string[] {
    return [...this.active.values()];
  }

  /**
   * Count `work` as active until it settles
   */
  public track(name: string, work: PromiseLike<unknown>): void {
    const key = ulid();
    this.active.set(key, name);

    const release = (): void => {
      this.active.delete(key);
    };

    work.then(release, release);
  }

  public describe(): SchedulingContextDescription {
    return {
      id: this.id,
      label: this.label,
      createdAt: this.createdAt,
      activeTaskCount: this.activeTaskCount,
    };
  }
}
