/**
 * CacheStore: holds the published Snapshot and derives change tokens.
 *
 * `publish()` is the only mutator and is called by the sync engine alone.
 * Everything for the next snapshot (encoding, hashing, diffing) is computed
 * before the reference is replaced, so `current()` never returns a
 * partially built value. Emits 'published' after each swap.
 *
 * @module cache/store
 */

import { EventEmitter } from 'node:events'
import { randomUUID } from 'node:crypto'
import { encodeTask, type CodecOptions } from '../ical/codec.js'
import { eventHref } from '../tree/paths.js'
import { StaleTokenError } from '../errors.js'
import { silentLogger, type Logger } from '../logger.js'
import {
  computeCtag,
  computeEtag,
  emptySnapshot,
  FrozenMap,
  type CalendarEntry,
  type ChangeRecord,
  type EventEntry,
  type FreshCalendar,
  type Snapshot,
  type SnapshotDraft,
  type StaleCalendar,
} from './snapshot.js'

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export interface CacheStoreOptions {
  codec?: CodecOptions
  /** Change records kept per calendar for sync-collection */
  historyLimit?: number
  /** Fixed epoch (tests); random per process otherwise */
  epoch?: string
  logger?: Logger
}

export interface PublishSummary {
  generation: number
  /** Projects whose ctag changed, new projects included */
  changed: string[]
  unchanged: string[]
  /** Projects whose task fetch failed this cycle */
  stale: string[]
  /** Projects dropped because upstream no longer lists them */
  removed: string[]
}

export interface ChangeSet {
  revision: number
  changed: string[]
  removed: string[]
}

export const DEFAULT_HISTORY_LIMIT = 100

const TOKEN_PREFIX = 'urn:taskdav:sync:'
const TOKEN_PATTERN = /^urn:taskdav:sync:([^:]+):(\d+)$/

// ─────────────────────────────────────────────────────────────────
// CacheStore
// ─────────────────────────────────────────────────────────────────

export class CacheStore extends EventEmitter {
  readonly epoch: string
  private snapshot: Snapshot
  private codec: CodecOptions
  private historyLimit: number
  private log: Logger

  constructor(options: CacheStoreOptions = {}) {
    super()
    this.epoch = options.epoch ?? randomUUID().replace(/-/g, '').slice(0, 12)
    this.snapshot = emptySnapshot(this.epoch)
    this.codec = options.codec ?? {}
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT)
    this.log = (options.logger ?? silentLogger()).child({ module: 'cache' })
  }

  /** The published snapshot. Callers keep the reference for the whole request. */
  current(): Snapshot {
    return this.snapshot
  }

  /**
   * Build the next snapshot from a cycle's draft and swap it in.
   */
  publish(draft: SnapshotDraft): PublishSummary {
    const previous = this.snapshot
    const calendars = new Map<string, CalendarEntry>()
    const summary: PublishSummary = {
      generation: previous.generation + 1,
      changed: [],
      unchanged: [],
      stale: [],
      removed: [],
    }

    for (const item of draft.calendars) {
      const prior = previous.calendars.get(item.project.id)
      if (item.kind === 'fresh') {
        const entry = this.buildFresh(item, prior, summary.generation, draft.completedAt)
        calendars.set(item.project.id, entry)
        if (prior && prior.ctag === entry.ctag) {
          summary.unchanged.push(item.project.id)
        } else {
          summary.changed.push(item.project.id)
        }
      } else {
        calendars.set(item.project.id, this.buildStale(item, prior, summary.generation, draft.completedAt))
        summary.stale.push(item.project.id)
      }
    }

    for (const projectId of previous.calendars.keys()) {
      if (!calendars.has(projectId)) summary.removed.push(projectId)
    }

    const next: Snapshot = Object.freeze({
      calendars: new FrozenMap(calendars),
      syncedAt: draft.completedAt,
      generation: summary.generation,
      epoch: this.epoch,
    })

    this.snapshot = next

    this.log.info(
      {
        generation: next.generation,
        changed: summary.changed.length,
        unchanged: summary.unchanged.length,
        stale: summary.stale.length,
        removed: summary.removed.length,
      },
      'snapshot published',
    )
    this.emit('published', next, summary)
    return summary
  }

  // ─── Sync tokens ───

  syncToken(entry: CalendarEntry): string {
    return `${TOKEN_PREFIX}${this.epoch}:${entry.revision}`
  }

  /**
   * Hrefs changed or removed in `entry` since the revision named by
   * `token`. When an href appears in several records the latest wins.
   *
   * @throws StaleTokenError when the token is malformed, from another
   *   process, ahead of the calendar, or older than the retained history
   */
  changesSince(entry: CalendarEntry, token: string): ChangeSet {
    const match = TOKEN_PATTERN.exec(token.trim())
    if (!match) {
      throw new StaleTokenError(`Unrecognized sync token: ${token}`)
    }
    const [, epoch, rawRevision] = match
    if (epoch !== this.epoch) {
      throw new StaleTokenError('Sync token was issued by another server instance')
    }

    const since = Number(rawRevision)
    if (since > entry.revision) {
      throw new StaleTokenError(`Sync token revision ${since} is ahead of ${entry.revision}`)
    }

    const oldest = entry.changes[0]
    if (since < entry.revision && (!oldest || since < oldest.revision - 1)) {
      throw new StaleTokenError(`Sync token revision ${since} is older than the retained history`)
    }

    const latest = new Map<string, 'changed' | 'removed'>()
    for (const record of entry.changes) {
      if (record.revision <= since) continue
      for (const href of record.changed) latest.set(href, 'changed')
      for (const href of record.removed) latest.set(href, 'removed')
    }

    const changes: ChangeSet = { revision: entry.revision, changed: [], removed: [] }
    for (const [href, kind] of latest) {
      changes[kind].push(href)
    }
    return changes
  }

  // ─────────────────────────────────────────────────────────────

  /**
   * Revisions are taken from the snapshot generation, so a calendar that
   * disappears and comes back never reissues a token of its earlier life.
   */
  private buildFresh(
    item: FreshCalendar,
    prior: CalendarEntry | undefined,
    generation: number,
    completedAt: string,
  ): CalendarEntry {
    const events = new Map<string, EventEntry>()
    for (const task of item.tasks) {
      const href = eventHref(item.project.id, task.id)
      const ics = encodeTask(item.project, task, this.codec)
      const reused = prior?.events.get(task.id)
      if (reused && reused.href === href && reused.ics === ics) {
        events.set(task.id, reused)
        continue
      }
      events.set(
        task.id,
        Object.freeze({
          task: Object.freeze({ ...task, tags: [...task.tags] }),
          href,
          ics,
          etag: computeEtag(ics),
        }),
      )
    }

    const ctag = computeCtag(events.values())
    let revision = prior?.revision ?? generation
    let changes: readonly ChangeRecord[] = prior?.changes ?? []

    if (!prior || prior.ctag !== ctag) {
      revision = generation
      changes = this.appendChange(changes, diffEvents(revision, prior, events))
    }

    return Object.freeze({
      project: Object.freeze({ ...item.project }),
      events: new FrozenMap(events),
      ctag,
      revision,
      changes,
      syncedAt: completedAt,
      stale: false,
      staleSince: null,
      error: null,
    })
  }

  private buildStale(
    item: StaleCalendar,
    prior: CalendarEntry | undefined,
    generation: number,
    completedAt: string,
  ): CalendarEntry {
    if (prior) {
      return Object.freeze({
        ...prior,
        stale: true,
        staleSince: prior.staleSince ?? completedAt,
        error: item.error,
      })
    }

    // Never fetched successfully: serve an empty calendar until it is
    const events = new FrozenMap<string, EventEntry>()
    return Object.freeze({
      project: Object.freeze({ ...item.project }),
      events,
      ctag: computeCtag(events.values()),
      revision: generation,
      changes: Object.freeze([Object.freeze({ revision: generation, changed: [], removed: [] })]),
      syncedAt: null,
      stale: true,
      staleSince: completedAt,
      error: item.error,
    })
  }

  private appendChange(changes: readonly ChangeRecord[], record: ChangeRecord): readonly ChangeRecord[] {
    return Object.freeze([...changes, record].slice(-this.historyLimit))
  }
}

function diffEvents(
  revision: number,
  prior: CalendarEntry | undefined,
  events: ReadonlyMap<string, EventEntry>,
): ChangeRecord {
  const before = new Map<string, string>()
  for (const entry of prior?.events.values() ?? []) {
    before.set(entry.href, entry.etag)
  }

  const changed: string[] = []
  const current = new Set<string>()
  for (const entry of events.values()) {
    current.add(entry.href)
    if (before.get(entry.href) !== entry.etag) changed.push(entry.href)
  }

  const removed = Array.from(before.keys()).filter((href) => !current.has(href))
  return Object.freeze({ revision, changed: Object.freeze(changed), removed: Object.freeze(removed) })
}
