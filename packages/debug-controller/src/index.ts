export * from './types/index.js';
export { BreakpointStore } from './breakpoints/breakpoint-store.js';
export { SessionError, SessionErrorCode, isSessionError } from './errors/session-error.js';
export {
  SessionController,
  type ExecutionPosition,
  type SessionControllerDependencies,
  type SessionControllerEvents,
} from './controller/session-controller.js';
export { DEBUG_ACTIONS, isActionName } from './controller/actions.js';
export { toLinkLine, toUiLine } from './controller/coordinates.js';
export { DispatchQueue } from './controller/dispatch-queue.js';
export { canTransition, isActivePhase, isLinkReady } from './controller/session-phase.js';
export { routeLinkEvent, type DebugLinkEventHandlers } from './controller/session-event-router.js';
export {
  ChildProcessHandle,
  createChildProcessFactory,
  execaLauncher,
  toProcessExit,
  type LaunchedProcess,
  type LaunchOptions,
  type ProcessLauncher,
} from './process/child-process-handle.js';
export {
  getDefaultProjectConfigPath,
  getUserConfigPath,
  getUserDir,
  resolveControllerConfig,
  type ResolveConfigOptions,
  type ResolvedControllerConfig,
} from './config/config-loader.js';
