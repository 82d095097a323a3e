/**
 * Supervision - restartable nodes arranged in a supervision tree
 *
 * - Ordered dependency start, exact reverse stop
 * - Runtime dependencies (started immediately, stopped first)
 * - Background tasks bound to the run and cancelled on stop
 * - Failure reports propagated up the tree through beacons
 *
 * @module supervision
 */

// Core classes
export { LifecycleNode } from './lifecycle-node';
export { Beacon } from './beacon';
export { DependencyGraph } from './dependency-graph';
export {
  SchedulingContext,
  type SchedulingContextDescription,
} from './scheduling-context';
export { describeTree } from './tree-report';
export {
  LifecycleNodeEvents,
  type LifecycleNodeEventMap,
  type LifecycleNodeEventName,
  type LifecycleNodeEmit,
  type BackgroundTaskOutcome,
} from './events';

// Types
export {
  NODE_STATE_TRANSITIONS,
  RUNNING_STATES,
  type NodeState,
  type LifecycleNodeOptions,
  type ServiceSpawnOptions,
  type FailureKind,
  type FailureReport,
  type SupervisedNode,
  type BackgroundWork,
  type BackgroundTaskInfo,
} from './types';

// Errors
export {
  InvalidNodeNameError,
  LifecycleStateError,
  NodeStartupError,
  NodeStopTimeoutError,
  BackgroundTaskError,
  ContextAffinityError,
  SupervisionCycleError,
  supervisionErrPrefix,
  supervisionErrTypes,
  supervisionErrCodes,
} from './errors';
