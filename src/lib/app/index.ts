/**
 * Application orchestration - the root of a streaming application's tree
 *
 * @module app
 */

export { Application } from './application';
export type {
  ApplicationOptions,
  ApplicationComponents,
  ApplicationEventMap,
} from './application';
export { Orchestrator, type OrchestratorOptions } from './orchestrator';
export { LazyProxy } from './lazy-proxy';
export { ExtraServiceRegistry } from './extra-service-registry';
export {
  InertNode,
  InertTableManager,
  Monitor,
  type InertTableManagerOptions,
} from './components';
export {
  Web,
  type WebOptions,
  type WebRequest,
  type WebResponse,
  type WebHandler,
  type ResponseOptions,
} from './web';
export {
  isZeroArgTask,
  isServiceClass,
  type OrchestratedApp,
  type TableManagerNode,
  type ExtraTask,
  type ZeroArgTask,
  type AppTask,
  type ServiceClass,
  type ExtraServiceEntry,
  type AppHook,
} from './types';
export {
  ConfigurationError,
  appErrPrefix,
  appErrTypes,
  appErrCodes,
  type AppErrCode,
} from './errors';
