/**
 * SyncEngine: periodic pull from upstream into the CacheStore.
 *
 * One cycle: fetch the project list (retried with backoff), fetch every
 * project's tasks concurrently, then publish one draft. A project whose
 * tasks cannot be fetched is carried forward stale; a project list that
 * cannot be fetched abandons the cycle and leaves the published snapshot
 * alone.
 *
 * At most one cycle runs at a time. Timer ticks that arrive during a cycle
 * are dropped, not queued.
 *
 *   idle → running → publishing → idle
 *              ↕
 *           backoff → idle (abandoned)
 *
 * `stop()` moves to the terminal `stopped` state.
 *
 * @module sync/engine
 */

import { EventEmitter } from 'node:events'
import { assertProjectSet, assertTaskSet } from '../domain/records.js'
import type { Project, Task } from '../domain/types.js'
import type { CacheStore, PublishSummary } from '../cache/store.js'
import type { DraftCalendar } from '../cache/snapshot.js'
import { describeError } from '../errors.js'
import { silentLogger, type Logger } from '../logger.js'
import { computeBackoff, DEFAULT_BACKOFF, sleep, type BackoffPolicy } from './backoff.js'
import type { UpstreamClient } from './upstream.js'

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type EngineState = 'idle' | 'running' | 'publishing' | 'backoff' | 'stopped'

export type CycleOutcome =
  /** New snapshot published (possibly with stale projects) */
  | 'published'
  /** Project list unavailable after all retries; previous snapshot kept */
  | 'abandoned'
  /** Another cycle was already running */
  | 'skipped'
  /** Engine stopped mid-cycle; nothing published */
  | 'aborted'

export interface CycleResult {
  outcome: CycleOutcome
  startedAt: string
  finishedAt: string
  /** Project-list fetch attempts made */
  attempts: number
  summary?: PublishSummary
  error?: string
}

export interface ProjectFailure {
  projectId: string
  error: string
  staleSince: string | null
}

export interface EngineStatus {
  state: EngineState
  cycles: number
  lastCycle: CycleResult | null
  lastSuccessAt: string | null
  /** Consecutive cycles abandoned because the project list failed */
  consecutiveFailures: number
  droppedTicks: number
  failures: ProjectFailure[]
}

export interface SyncEngineOptions {
  upstream: UpstreamClient
  store: CacheStore
  intervalMs: number
  /** Per upstream call */
  timeoutMs: number
  syncOnStart?: boolean
  backoff?: BackoffPolicy
  logger?: Logger
  /** Jitter source for backoff (tests) */
  random?: () => number
  now?: () => Date
}

type TaskFetch = PromiseSettledResult<Task[]>

// ─────────────────────────────────────────────────────────────────
// SyncEngine
// ─────────────────────────────────────────────────────────────────

export class SyncEngine extends EventEmitter {
  private upstream: UpstreamClient
  private store: CacheStore
  private intervalMs: number
  private timeoutMs: number
  private syncOnStart: boolean
  private backoff: BackoffPolicy
  private random: () => number
  private now: () => Date
  private log: Logger

  private state: EngineState = 'idle'
  private timer: ReturnType<typeof setInterval> | null = null
  private inFlight: Promise<CycleResult> | null = null
  private stopController = new AbortController()

  private cycles = 0
  private droppedTicks = 0
  private consecutiveFailures = 0
  private lastCycle: CycleResult | null = null
  private lastSuccessAt: string | null = null

  constructor(options: SyncEngineOptions) {
    super()
    this.upstream = options.upstream
    this.store = options.store
    this.intervalMs = options.intervalMs
    this.timeoutMs = options.timeoutMs
    this.syncOnStart = options.syncOnStart ?? true
    this.backoff = options.backoff ?? DEFAULT_BACKOFF
    this.random = options.random ?? Math.random
    this.now = options.now ?? (() => new Date())
    this.log = (options.logger ?? silentLogger()).child({ module: 'sync' })
  }

  /** Arm the interval timer and, if configured, run a first cycle right away. */
  start(): void {
    if (this.state === 'stopped') {
      throw new Error('SyncEngine cannot be restarted after stop()')
    }
    if (this.timer) return

    this.log.info({ intervalMs: this.intervalMs, syncOnStart: this.syncOnStart }, 'sync engine started')
    this.timer = setInterval(() => this.tick(), this.intervalMs)
    if (this.syncOnStart) this.tick()
  }

  /**
   * Cancel the in-flight cycle's upstream calls and backoff wait, and stop
   * scheduling. Resolves once the cycle has wound down.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return
    this.state = 'stopped'

    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    this.stopController.abort(new Error('Sync engine stopped'))

    if (this.inFlight) {
      await this.inFlight
    }
    this.log.info('sync engine stopped')
  }

  /**
   * Run one cycle now. Returns `skipped` immediately when a cycle is
   * already in flight or the engine is stopped.
   */
  runCycle(): Promise<CycleResult> {
    if (this.inFlight || this.state === 'stopped') {
      const at = this.now().toISOString()
      return Promise.resolve({ outcome: 'skipped', startedAt: at, finishedAt: at, attempts: 0 })
    }

    this.inFlight = this.cycle().finally(() => {
      this.inFlight = null
    })
    return this.inFlight
  }

  /** The in-flight cycle, if any */
  whenIdle(): Promise<void> {
    return this.inFlight ? this.inFlight.then(() => undefined) : Promise.resolve()
  }

  status(): EngineStatus {
    const failures: ProjectFailure[] = []
    for (const calendar of this.store.current().calendars.values()) {
      if (calendar.stale) {
        failures.push({
          projectId: calendar.project.id,
          error: calendar.error ?? 'unknown error',
          staleSince: calendar.staleSince,
        })
      }
    }

    return {
      state: this.state,
      cycles: this.cycles,
      lastCycle: this.lastCycle,
      lastSuccessAt: this.lastSuccessAt,
      consecutiveFailures: this.consecutiveFailures,
      droppedTicks: this.droppedTicks,
      failures,
    }
  }

  // ─────────────────────────────────────────────────────────────

  private tick(): void {
    if (this.inFlight) {
      this.droppedTicks++
      this.log.warn({ droppedTicks: this.droppedTicks }, 'sync tick dropped, previous cycle still running')
      return
    }

    this.runCycle().catch((err) => {
      this.log.error({ err: describeError(err) }, 'sync cycle crashed')
    })
  }

  private setState(state: EngineState): void {
    if (this.state !== 'stopped') this.state = state
  }

  private get stopping(): boolean {
    return this.stopController.signal.aborted
  }

  private async cycle(): Promise<CycleResult> {
    const startedAt = this.now().toISOString()
    this.cycles++
    this.setState('running')
    this.log.info({ cycle: this.cycles }, 'sync cycle started')

    let result: CycleResult
    try {
      result = await this.execute(startedAt)
    } finally {
      this.setState('idle')
    }

    this.lastCycle = result
    if (result.outcome === 'published') {
      this.lastSuccessAt = result.finishedAt
      this.consecutiveFailures = 0
    } else if (result.outcome === 'abandoned') {
      this.consecutiveFailures++
    }

    this.log.info(
      { cycle: this.cycles, outcome: result.outcome, attempts: result.attempts },
      'sync cycle finished',
    )
    this.emit('cycle', result)
    return result
  }

  private async execute(startedAt: string): Promise<CycleResult> {
    const finish = (outcome: CycleOutcome, attempts: number, extra: Partial<CycleResult> = {}): CycleResult => ({
      outcome,
      startedAt,
      finishedAt: this.now().toISOString(),
      attempts,
      ...extra,
    })

    const listing = await this.fetchProjects()
    if (this.stopping) return finish('aborted', listing.attempts)
    if (!listing.projects) {
      return finish('abandoned', listing.attempts, { error: listing.error })
    }

    const projects = listing.projects
    const fetches = await Promise.allSettled(projects.map((project) => this.fetchTasks(project)))
    if (this.stopping) return finish('aborted', listing.attempts)

    const calendars = projects.map((project, index) => this.draftCalendar(project, fetches[index]))

    this.setState('publishing')
    const summary = this.store.publish({ calendars, completedAt: this.now().toISOString() })
    return finish('published', listing.attempts, { summary })
  }

  private draftCalendar(project: Project, fetch: TaskFetch | undefined): DraftCalendar {
    if (fetch?.status === 'fulfilled') {
      return { kind: 'fresh', project, tasks: fetch.value }
    }

    const error = fetch ? describeError(fetch.reason) : 'task fetch missing'
    this.log.warn({ projectId: project.id, err: error }, 'task fetch failed, serving previous data')
    return { kind: 'stale', project, error }
  }

  private async fetchProjects(): Promise<{ projects: Project[] | null; attempts: number; error?: string }> {
    for (let attempt = 0; ; attempt++) {
      try {
        const projects = await this.call((signal) => this.upstream.listProjects(signal))
        assertProjectSet(projects)
        return { projects, attempts: attempt + 1 }
      } catch (err) {
        const error = describeError(err)
        if (this.stopping) return { projects: null, attempts: attempt + 1, error }

        const delayMs = computeBackoff(this.backoff, attempt, this.random)
        if (delayMs === null) {
          this.log.error({ attempts: attempt + 1, err: error }, 'project list unavailable, keeping previous snapshot')
          return { projects: null, attempts: attempt + 1, error }
        }

        this.log.warn({ attempt: attempt + 1, delayMs, err: error }, 'project list fetch failed, backing off')
        this.setState('backoff')
        try {
          await sleep(delayMs, this.stopController.signal)
        } catch {
          return { projects: null, attempts: attempt + 1, error }
        }
        this.setState('running')
      }
    }
  }

  private async fetchTasks(project: Project): Promise<Task[]> {
    const tasks = await this.call((signal) => this.upstream.listTasks(project.id, signal))
    assertTaskSet(project.id, tasks)
    return tasks
  }

  /** Upstream call bounded by the per-call timeout and by stop() */
  /**
   * Runs one upstream call under the timeout and the stop signal. The call
   * settles when the signal fires even if the client never looks at it.
   */
  private call<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const signal = AbortSignal.any([AbortSignal.timeout(this.timeoutMs), this.stopController.signal])
    if (signal.aborted) return Promise.reject(signal.reason)
    let onAbort = (): void => {}
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(signal.reason)
      signal.addEventListener('abort', onAbort, { once: true })
    })
    return Promise.race([fn(signal), aborted]).finally(() => signal.removeEventListener('abort', onAbort))
  }
}
