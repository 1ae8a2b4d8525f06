/**
 * Resource Tree
 *
 * Read-only view of a Snapshot as a WebDAV hierarchy. Every function takes
 * the snapshot explicitly; nothing here holds state, so one request can
 * resolve and enumerate against the single snapshot it started with.
 *
 * @module tree/resource-tree
 */

import { NotFoundError } from '../errors.js'
import type { CalendarEntry, EventEntry, Snapshot } from '../cache/snapshot.js'
import {
  CALENDAR_FILE,
  CALENDAR_HOME_HREF,
  ICS_SUFFIX,
  PRINCIPALS_HREF,
  ROOT_HREF,
  calendarFileHref,
  calendarHref,
  principalHref,
  splitPath,
} from './paths.js'

export type ResourceNode =
  | { kind: 'root' }
  | { kind: 'principals' }
  | { kind: 'principal'; username: string }
  | { kind: 'calendar-home' }
  | { kind: 'calendar'; calendar: CalendarEntry }
  | { kind: 'calendar-file'; calendar: CalendarEntry }
  | { kind: 'event'; calendar: CalendarEntry; event: EventEntry }

export type ResourceKind = ResourceNode['kind']

export interface TreeOptions {
  /** The single principal served */
  username: string
}

/**
 * Map a request path onto the snapshot.
 *
 * @throws NotFoundError when nothing lives at `path`
 */
export function resolve(snapshot: Snapshot, path: string, options: TreeOptions): ResourceNode {
  const segments = splitPath(path)
  if (segments === null) {
    throw new NotFoundError(`Not found: ${path}`)
  }

  const [top, second, third, ...rest] = segments
  if (rest.length > 0) {
    throw new NotFoundError(`Not found: ${path}`)
  }

  if (top === undefined) return { kind: 'root' }

  if (top === 'principals' && third === undefined) {
    if (second === undefined) return { kind: 'principals' }
    if (second === options.username) return { kind: 'principal', username: second }
  }

  if (top === 'calendars') {
    if (second === undefined) return { kind: 'calendar-home' }

    const calendar = snapshot.calendars.get(second)
    if (calendar) {
      if (third === undefined) return { kind: 'calendar', calendar }
      // A task whose id is `calendar` owns its href; the aggregate stays
      // reachable at the collection URL
      if (third.endsWith(ICS_SUFFIX)) {
        const event = calendar.events.get(third.slice(0, -ICS_SUFFIX.length))
        if (event) return { kind: 'event', calendar, event }
      }
      if (third === CALENDAR_FILE) return { kind: 'calendar-file', calendar }
    }
  }

  throw new NotFoundError(`Not found: ${path}`)
}

/**
 * Immediate members of a collection, for `Depth: 1`.
 */
export function children(snapshot: Snapshot, node: ResourceNode, options: TreeOptions): ResourceNode[] {
  switch (node.kind) {
    case 'root':
      return [{ kind: 'principals' }, { kind: 'calendar-home' }]
    case 'principals':
      return [{ kind: 'principal', username: options.username }]
    case 'calendar-home':
      return Array.from(snapshot.calendars.values(), (calendar) => ({ kind: 'calendar', calendar }) as const)
    case 'calendar':
      return Array.from(node.calendar.events.values(), (event) => ({
        kind: 'event',
        calendar: node.calendar,
        event,
      }) as const)
    default:
      return []
  }
}

export function hrefOf(node: ResourceNode): string {
  switch (node.kind) {
    case 'root':
      return ROOT_HREF
    case 'principals':
      return PRINCIPALS_HREF
    case 'principal':
      return principalHref(node.username)
    case 'calendar-home':
      return CALENDAR_HOME_HREF
    case 'calendar':
      return calendarHref(node.calendar.project.id)
    case 'calendar-file':
      return calendarFileHref(node.calendar.project.id)
    case 'event':
      return node.event.href
  }
}

export function isCollection(node: ResourceNode): boolean {
  return node.kind !== 'event' && node.kind !== 'calendar-file'
}
