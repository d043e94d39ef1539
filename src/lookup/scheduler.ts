/**
 * Poll Scheduling
 *
 * Background timers for follow-up polls and the cache sweep, and the backoff
 * curve that spaces polls out.
 */

import { type Logger, silentLogger } from '../logger'

export type CancelFn = () => void

export type ScheduledTask = () => Promise<void>

export interface Scheduler {
  /** Run `task` once after `delayMs`. The returned function cancels it if it has not started. */
  schedule(delayMs: number, task: ScheduledTask): CancelFn
}

export interface TimerSchedulerOptions {
  /**
   * Unreference timers so a one-shot process can exit while polls are still
   * queued (default: true). A caller that awaits the outcome of a poll needs
   * referenced timers to keep the process alive.
   */
  readonly unref?: boolean
}

/**
 * Scheduler on node timers.
 */
export function createTimerScheduler(
  logger: Logger = silentLogger,
  options: TimerSchedulerOptions = {}
): Scheduler {
  const unref = options.unref ?? true
  return {
    schedule(delayMs: number, task: ScheduledTask): CancelFn {
      const handle = setTimeout(() => {
        task().catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error)
          logger.error(`Scheduled task failed: ${message}`)
        })
      }, Math.max(0, delayMs))
      if (unref) {
        handle.unref()
      }
      return () => clearTimeout(handle)
    }
  }
}

export interface BackoffPolicy {
  /** Delay before the second call; doubles for each further attempt */
  readonly baseDelayMs: number
  /** Ceiling on any delay, service hints included */
  readonly maxDelayMs: number
}

/**
 * Delay before the next poll after `attempts` "still searching" answers.
 *
 * A hint from the service wins over the exponential curve; both are capped.
 */
export function nextPollDelay(
  attempts: number,
  policy: BackoffPolicy,
  hintMs?: number | undefined
): number {
  if (hintMs !== undefined) {
    return Math.min(Math.max(0, hintMs), policy.maxDelayMs)
  }
  const exponent = Math.max(0, attempts - 1)
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs)
}
