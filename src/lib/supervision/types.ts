import type { Logger } from '../logger';
import type { Beacon } from './beacon';
import type { SchedulingContext } from './scheduling-context';

/**
 * Lifecycle state of a node
 */
export type NodeState =
  | 'init' // Constructed, never started
  | 'starting' // Children starting in order, hooks running
  | 'started' // Self and every child started
  | 'stopping' // Hooks and children stopping in reverse order
  | 'stopped' // Self and every child stopped (can start again)
  | 'crashed' // Failed while running; reported to the supervisor
  | 'restarting'; // Between the stop and the start of a restart

/**
 * States in which a node counts as running for context affinity
 */
export const RUNNING_STATES: readonly NodeState[] = [
  'starting',
  'started',
  'stopping',
];

/**
 * Legal transitions of the node state machine
 */
export const NODE_STATE_TRANSITIONS: Readonly<
  Record<NodeState, readonly NodeState[]>
> = {
  init: ['starting', 'restarting'],
  starting: ['started', 'stopped', 'crashed'],
  started: ['stopping', 'crashed'],
  stopping: ['stopped', 'crashed'],
  stopped: ['starting', 'restarting'],
  crashed: ['starting', 'stopping', 'restarting'],
  restarting: ['starting'],
};

export interface LifecycleNodeOptions {
  /** Node name (kebab-case), also the logger service name */
  name: string;

  /** Root logger (the node creates a scoped logger) */
  logger: Logger;

  /** Scheduling context; adopted from the parent when omitted */
  context?: SchedulingContext | null;

  /** Parent beacon to attach under; the node is a tree root when omitted */
  beacon?: Beacon;

  /** Deadline for each child's stop in milliseconds, 0 waits indefinitely */
  stopTimeoutMS?: number;

  /** How long stop() waits for cancelled background tasks to settle */
  taskCancelTimeoutMS?: number;
}

/**
 * What the orchestrator hands to service classes it instantiates
 */
export interface ServiceSpawnOptions {
  logger: Logger;
  context: SchedulingContext;
  beacon: Beacon;
}

export type FailureKind =
  | 'startup' // start() failed
  | 'crash' // crash() was called
  | 'stop-timeout' // stop exceeded the parent's deadline
  | 'background-task' // a tracked task rejected
  | 'runtime-dependency'; // a dependency added after start failed to start

/**
 * Diagnostic record passed up the supervision tree
 */
export interface FailureReport {
  kind: FailureKind;

  /** Label of the node where the failure happened */
  origin: string;

  /** Labels from the tree root down to the origin */
  path: string[];

  error: Error;
  timestamp: number;
}

/**
 * What a beacon needs to know about the node it belongs to
 */
export interface SupervisedNode {
  readonly label: string;
  readonly state: NodeState;
  receiveFailureReport(report: FailureReport): void;
}

/**
 * A long-running unit of work owned by a node.
 * The signal aborts when the owner stops.
 */
export type BackgroundWork = (signal: AbortSignal) => PromiseLike<unknown>;

export interface BackgroundTaskInfo {
  id: string;
  name: string;
  startedAt: number;
}
