import type { FailureReport, NodeState } from './types';

export type BackgroundTaskOutcome = 'completed' | 'failed' | 'cancelled';

export interface LifecycleNodeEventMap {
  'node:state': { name: string; from: NodeState; to: NodeState };
  'node:failure': FailureReport;
  'node:dependency-added': { name: string; dependency: string };
  'node:startup-rollback': { name: string; dependency: string };
  'node:stop-timeout': { name: string; dependency: string; timeoutMS: number };
  'node:task-started': { name: string; taskID: string; taskName: string };
  'node:task-finished': {
    name: string;
    taskID: string;
    taskName: string;
    outcome: BackgroundTaskOutcome;
    durationMS: number;
  };
}

export type LifecycleNodeEventName = keyof LifecycleNodeEventMap;

export type LifecycleNodeEmit = <K extends LifecycleNodeEventName>(
  event: K,
  data: LifecycleNodeEventMap[K],
) => void;

export class LifecycleNodeEvents {
  constructor(
    private readonly name: string,
    private readonly emit: LifecycleNodeEmit,
  ) {}

  public stateChanged(from: NodeState, to: NodeState): void {
    this.emit('node:state', { name: this.name, from, to });
  }

  public failure(report: FailureReport): void {
    this.emit('node:failure', report);
  }

  public dependencyAdded(dependency: string): void {
    this.emit('node:dependency-added', { name: this.name, dependency });
  }

  public startupRollback(dependency: string): void {
    this.emit('node:startup-rollback', { name: this.name, dependency });
  }

  public stopTimeout(dependency: string, timeoutMS: number): void {
    this.emit('node:stop-timeout', {
      name: this.name,
      dependency,
      timeoutMS,
    });
  }

  public taskStarted(taskID: string, taskName: string): void {
    this.emit('node:task-started', { name: this.name, taskID, taskName });
  }

  public taskFinished(input: {
    taskID: string;
    taskName: string;
    outcome: BackgroundTaskOutcome;
    durationMS: number;
  }): void {
    this.emit('node:task-finished', { name: this.name, ...input });
  }
}
