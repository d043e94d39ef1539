/**
 * Lookup Module
 *
 * Cache-miss resolution: single-flight coordinator, background polling and
 * the facade callers go through.
 */

export {
  type CoordinatorConfig,
  type LookupOutcome,
  LookupCoordinator,
  type PendingLookupView,
  resolvePath,
  type TerminalOutcome
} from './coordinator'
export { type FacadeConfig, LIST_PATH, type LookupResult, RequestFacade } from './facade'
export {
  type BackoffPolicy,
  type CancelFn,
  createTimerScheduler,
  nextPollDelay,
  type ScheduledTask,
  type Scheduler,
  type TimerSchedulerOptions
} from './scheduler'
