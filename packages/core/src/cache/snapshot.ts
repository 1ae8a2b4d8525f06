/**
 * Snapshot Model
 *
 * A Snapshot is the complete served state produced by one sync cycle. It is
 * built off to the side, frozen, and then published by swapping a single
 * reference, so a reader holding one never sees it change.
 */

import { createHash } from 'node:crypto'
import type { Project, Task } from '../domain/types.js'

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export interface EventEntry {
  readonly task: Task
  readonly href: string
  /** Serialized calendar object resource */
  readonly ics: string
  /** Quoted strong ETag, `"<sha256 hex>"` */
  readonly etag: string
}

/** One published revision of a calendar's membership */
export interface ChangeRecord {
  readonly revision: number
  /** Hrefs added or modified in this revision */
  readonly changed: readonly string[]
  readonly removed: readonly string[]
}

export interface CalendarEntry {
  readonly project: Project
  /** taskId → entry, in upstream order */
  readonly events: ReadonlyMap<string, EventEntry>
  readonly ctag: string
  /** Monotonic; advances exactly when `ctag` changes */
  readonly revision: number
  /** Oldest first, at most `historyLimit` records */
  readonly changes: readonly ChangeRecord[]
  /** Last time this project's tasks were fetched successfully */
  readonly syncedAt: string | null
  readonly stale: boolean
  readonly staleSince: string | null
  /** Failure reason while stale */
  readonly error: string | null
}

export interface Snapshot {
  /** projectId → calendar, in upstream order */
  readonly calendars: ReadonlyMap<string, CalendarEntry>
  /** Completion time of the cycle that produced this snapshot */
  readonly syncedAt: string | null
  /** Number of publishes so far; 0 for the initial empty snapshot */
  readonly generation: number
  /** Per-process value embedded in sync tokens */
  readonly epoch: string
}

/** Tasks fetched in this cycle */
export interface FreshCalendar {
  kind: 'fresh'
  project: Project
  tasks: readonly Task[]
}

/** Task fetch failed; the previous entry (if any) is carried forward */
export interface StaleCalendar {
  kind: 'stale'
  project: Project
  error: string
}

export type DraftCalendar = FreshCalendar | StaleCalendar

/** What a sync cycle hands to `CacheStore.publish` */
export interface SnapshotDraft {
  calendars: DraftCalendar[]
  /** Cycle completion time (ISO-8601) */
  completedAt: string
}

// ─────────────────────────────────────────────────────────────────
// Read-only maps
// ─────────────────────────────────────────────────────────────────

/**
 * Map view with no mutators. The backing Map is copied on construction
 * and never exposed, so a published snapshot cannot be changed through it.
 */
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly backing: Map<K, V>

  constructor(entries: Iterable<readonly [K, V]> = []) {
    this.backing = new Map(entries)
    Object.freeze(this)
  }

  get size(): number {
    return this.backing.size
  }

  get(key: K): V | undefined {
    return this.backing.get(key)
  }

  has(key: K): boolean {
    return this.backing.has(key)
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.backing.forEach((value, key) => callback.call(thisArg, value, key, this))
  }

  entries() {
    return this.backing.entries()
  }

  keys() {
    return this.backing.keys()
  }

  values() {
    return this.backing.values()
  }

  [Symbol.iterator]() {
    return this.backing[Symbol.iterator]()
  }
}

// ─────────────────────────────────────────────────────────────────
// Hashing
// ─────────────────────────────────────────────────────────────────

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex')
}

export function computeEtag(ics: string): string {
  return `"${sha256(ics)}"`
}

/**
 * Collection tag over the member set: order-independent, and a pure
 * function of the (href, etag) pairs.
 */
export function computeCtag(events: Iterable<EventEntry>): string {
  const pairs = Array.from(events, (entry) => `${entry.href} ${entry.etag}`).sort()
  return sha256(pairs.join('\n'))
}

export function emptySnapshot(epoch: string): Snapshot {
  return Object.freeze({
    calendars: new FrozenMap<string, CalendarEntry>(),
    syncedAt: null,
    generation: 0,
    epoch,
  })
}
