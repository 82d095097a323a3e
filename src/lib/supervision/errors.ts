import type { NodeState } from './types';

/**
 * Error prefix constant for all supervision errors
 */
export const supervisionErrPrefix = 'SupervisionErr';

/**
 * Error type constants
 */
export const supervisionErrTypes = {
  Node: 'Node',
  Lifecycle: 'Lifecycle',
  Task: 'Task',
  Tree: 'Tree',
} as const;

/**
 * Error code constants
 */
export const supervisionErrCodes = {
  InvalidName: 'InvalidName',
  InvalidState: 'InvalidState',
  StartupFailed: 'StartupFailed',
  StopTimeout: 'StopTimeout',
  TaskFailed: 'TaskFailed',
  ContextAffinity: 'ContextAffinity',
  Cycle: 'Cycle',
} as const;

/**
 * Thrown when a node name doesn't match kebab-case validation
 *
 * Valid names: 'producer', 'reply-consumer', 'table-manager-v2'
 */
export class InvalidNodeNameError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Node;
  public errCode = supervisionErrCodes.InvalidName;
  public additionalInfo: { name: string };

  constructor(additionalInfo: { name: string }) {
    super(
      `Invalid node name: "${additionalInfo.name}". Node names must be kebab-case (lowercase letters, numbers, and hyphens only).`,
    );
    this.name = 'InvalidNodeNameError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Thrown when an operation is not allowed in the node's current state,
 * or when a transition would break the state machine
 */
export class LifecycleStateError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Lifecycle;
  public errCode = supervisionErrCodes.InvalidState;
  public additionalInfo: { nodeName: string; operation: string; state: NodeState };

  constructor(additionalInfo: {
    nodeName: string;
    operation: string;
    state: NodeState;
  }) {
    super(
      `Cannot ${additionalInfo.operation} node "${additionalInfo.nodeName}" while it is ${additionalInfo.state}`,
    );
    this.name = 'LifecycleStateError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * A dependency failed while its parent was starting.
 *
 * Wraps the underlying error; the parent never reaches `started`.
 */
export class NodeStartupError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Lifecycle;
  public errCode = supervisionErrCodes.StartupFailed;
  public additionalInfo: { nodeName: string; dependencyName: string };
  public cause?: Error;

  constructor(
    additionalInfo: { nodeName: string; dependencyName: string },
    cause?: Error,
  ) {
    const causeMessage = cause ? `: ${cause.message}` : '';
    super(
      `Node "${additionalInfo.nodeName}" failed to start because dependency "${additionalInfo.dependencyName}" failed${causeMessage}`,
    );
    this.name = 'NodeStartupError';
    this.additionalInfo = additionalInfo;

    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * A child's stop did not finish within its parent's stop deadline
 */
export class NodeStopTimeoutError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Lifecycle;
  public errCode = supervisionErrCodes.StopTimeout;
  public additionalInfo: { nodeName: string; timeoutMS: number };

  constructor(additionalInfo: { nodeName: string; timeoutMS: number }) {
    super(
      `Node "${additionalInfo.nodeName}" stop timed out after ${additionalInfo.timeoutMS}ms`,
    );
    this.name = 'NodeStopTimeoutError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * A background task or a runtime dependency failed after its owner started.
 *
 * Reported through the supervision tree; the owner keeps running.
 */
export class BackgroundTaskError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Task;
  public errCode = supervisionErrCodes.TaskFailed;
  public additionalInfo: { nodeName: string; taskName: string };
  public cause?: Error;

  constructor(
    additionalInfo: { nodeName: string; taskName: string },
    cause?: Error,
  ) {
    const causeMessage = cause ? `: ${cause.message}` : '';
    super(
      `Background task "${additionalInfo.taskName}" of node "${additionalInfo.nodeName}" failed${causeMessage}`,
    );
    this.name = 'BackgroundTaskError';
    this.additionalInfo = additionalInfo;

    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when a running node would be moved to another scheduling context
 */
export class ContextAffinityError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Tree;
  public errCode = supervisionErrCodes.ContextAffinity;
  public additionalInfo: { nodeName: string; contextID: string };

  constructor(additionalInfo: { nodeName: string; contextID: string }) {
    super(
      `Node "${additionalInfo.nodeName}" is running and cannot be moved to scheduling context ${additionalInfo.contextID}`,
    );
    this.name = 'ContextAffinityError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Thrown when attaching a beacon under itself or one of its descendants
 */
export class SupervisionCycleError extends Error {
  public errPrefix = supervisionErrPrefix;
  public errType = supervisionErrTypes.Tree;
  public errCode = supervisionErrCodes.Cycle;
  public additionalInfo: { nodeLabel: string; parentLabel: string };

  constructor(additionalInfo: { nodeLabel: string; parentLabel: string }) {
    super(
      `Cannot attach "${additionalInfo.nodeLabel}" under "${additionalInfo.parentLabel}": it would supervise itself`,
    );
    this.name = 'SupervisionCycleError';
    this.additionalInfo = additionalInfo;
  }
}
