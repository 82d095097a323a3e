// module entry point

// Supervision - full export from the supervision module
export * from './lib/supervision/index';

// Application orchestration - full export from the app module
export * from './lib/app/index';

// Worker
export { Worker, type WorkerOptions } from './lib/worker';

// Logger
export * from './lib/logger/index';

// Process Signal Manager
export {
  ProcessSignalManager,
  type ProcessSignalManagerOptions,
  type ProcessSignalManagerStatus,
  type ShutdownSignal,
} from './lib/process-signal-manager';

// Event handling
export { EventEmitter, EventEmitterProtected } from './lib/event-emitter';

// Callback handling
export {
  safeHandleCallback,
  onCallbackError,
} from './lib/safe-handle-callback';

// Utility functions
export { CompletionSignal } from './lib/completion-signal';
export { sleep } from './lib/sleep';
export { errorToString } from './lib/error-to-string';
export { toError } from './lib/to-error';
export { isNumber } from './lib/is-number';
export { isFunction } from './lib/is-function';
export { isPromise } from './lib/is-promise';
