/**
 * Manual Scheduler for Tests
 *
 * Virtual clock plus scheduler. Nothing runs until the test advances time;
 * each due task is awaited before the next one starts, so every poll is
 * deterministic.
 *
 * Usage:
 * ```ts
 * const scheduler = new ManualScheduler()
 * const cache = new LookupCache({ clock: scheduler.now })
 * // ... trigger a lookup that schedules a poll ...
 * await scheduler.advance(5_000)
 * ```
 */

import type { CancelFn, ScheduledTask, Scheduler } from '../lookup/scheduler'

interface QueuedTask {
  readonly id: number
  readonly dueAt: number
  readonly task: ScheduledTask
}

export class ManualScheduler implements Scheduler {
  private current: number
  private nextId = 0
  private queue: QueuedTask[] = []

  constructor(start = 0) {
    this.current = start
  }

  readonly now = (): number => this.current

  get pendingTasks(): number {
    return this.queue.length
  }

  /** Due time of the earliest queued task, if any */
  get nextDueAt(): number | undefined {
    return this.earliest()?.dueAt
  }

  schedule(delayMs: number, task: ScheduledTask): CancelFn {
    const queued: QueuedTask = { id: this.nextId++, dueAt: this.current + Math.max(0, delayMs), task }
    this.queue.push(queued)
    return () => {
      this.queue = this.queue.filter((q) => q.id !== queued.id)
    }
  }

  /**
   * Move the clock forward by `ms`, running every task that falls due on the
   * way, in due order. Tasks scheduled by those tasks run too if they fall
   * inside the window.
   */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms
    for (;;) {
      const next = this.earliest()
      if (!next || next.dueAt > target) break
      this.queue = this.queue.filter((q) => q.id !== next.id)
      this.current = next.dueAt
      await next.task()
    }
    this.current = target
  }

  /**
   * Run queued tasks until none remain, jumping the clock to each due time.
   * Stops after `maxTasks` to catch tasks that reschedule themselves forever.
   */
  async runAll(maxTasks = 100): Promise<number> {
    let ran = 0
    for (;;) {
      const next = this.earliest()
      if (!next) return ran
      if (ran >= maxTasks) {
        throw new Error(`ManualScheduler.runAll gave up after ${maxTasks} tasks`)
      }
      this.queue = this.queue.filter((q) => q.id !== next.id)
      this.current = Math.max(this.current, next.dueAt)
      await next.task()
      ran++
    }
  }

  private earliest(): QueuedTask | undefined {
    let best: QueuedTask | undefined
    for (const queued of this.queue) {
      if (!best || queued.dueAt < best.dueAt || (queued.dueAt === best.dueAt && queued.id < best.id)) {
        best = queued
      }
    }
    return best
  }
}
