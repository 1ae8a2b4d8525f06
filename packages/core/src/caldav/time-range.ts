/**
 * calendar-query filtering (RFC 4791 §9.7, simplified).
 *
 * A task occupies the interval from its first date to its last. Date-only
 * values cover the whole day in the configured zone; a task with a single
 * date occupies just that date. A VTODO with no dates matches every range.
 */

import { DateTime } from 'luxon'
import { componentKind, type ComponentKind } from '../ical/codec.js'
import { isDateOnly, type Task, type TaskDate } from '../domain/types.js'
import { ProtocolRequestError } from '../errors.js'
import { CALDAV_NS, findChild, findChildren, type XmlElement } from './xml.js'

export interface TimeRange {
  /** Epoch milliseconds, inclusive */
  start?: number
  /** Epoch milliseconds, exclusive */
  end?: number
}

export interface CalendarFilter {
  /** null: any component */
  component: ComponentKind | null
  /** Component name the filter names but we never serve (e.g. VJOURNAL) */
  unsupported: boolean
  range?: TimeRange
}

interface Interval {
  start: number
  end: number
}

/** `20240601T000000Z` → epoch ms */
export function parseUtcStamp(value: string): number {
  const dt = DateTime.fromFormat(value, "yyyyMMdd'T'HHmmss'Z'", { zone: 'utc' })
  if (!dt.isValid) {
    throw new ProtocolRequestError(`Invalid time-range value "${value}"`)
  }
  return dt.toMillis()
}

/**
 * Read `<C:filter>` from a calendar-query body. A missing filter matches
 * everything.
 */
export function parseFilter(query: XmlElement): CalendarFilter {
  const filter = findChild(query, CALDAV_NS, 'filter')
  const calendar = filter ? findChild(filter, CALDAV_NS, 'comp-filter') : undefined
  if (!calendar) return { component: null, unsupported: false }

  if ((calendar.attrs.name ?? '').toUpperCase() !== 'VCALENDAR') {
    return { component: null, unsupported: true }
  }

  const inner = findChildren(calendar, CALDAV_NS, 'comp-filter')[0]
  if (!inner) return { component: null, unsupported: false }

  const name = (inner.attrs.name ?? '').toUpperCase()
  const component = name === 'VEVENT' || name === 'VTODO' ? name : null
  const rangeElement = findChild(inner, CALDAV_NS, 'time-range')

  let range: TimeRange | undefined
  if (rangeElement) {
    range = {}
    if (rangeElement.attrs.start) range.start = parseUtcStamp(rangeElement.attrs.start)
    if (rangeElement.attrs.end) range.end = parseUtcStamp(rangeElement.attrs.end)
  }

  return { component, unsupported: component === null, range }
}

function dayStart(date: TaskDate, zone: string): number {
  return DateTime.fromISO(date, { zone }).startOf('day').toMillis()
}

function begin(date: TaskDate, zone: string): number {
  return isDateOnly(date) ? dayStart(date, zone) : DateTime.fromISO(date).toMillis()
}

function finish(date: TaskDate, zone: string): number {
  return isDateOnly(date)
    ? DateTime.fromISO(date, { zone }).startOf('day').plus({ days: 1 }).toMillis()
    : DateTime.fromISO(date).toMillis()
}

function taskInterval(task: Task, zone: string): Interval | null {
  const first = task.start ?? task.due
  const last = task.due ?? task.start
  if (first === undefined || last === undefined) return null
  return { start: begin(first, zone), end: finish(last, zone) }
}

export function overlaps(task: Task, range: TimeRange, zone: string): boolean {
  const interval = taskInterval(task, zone)
  if (interval === null) return true

  const beforeEnd = range.end === undefined || interval.start < range.end
  // a zero-length interval sitting on the range start still counts
  const afterStart =
    range.start === undefined ||
    interval.end > range.start ||
    (interval.start === interval.end && interval.start === range.start)
  return beforeEnd && afterStart
}

export function matchesFilter(task: Task, filter: CalendarFilter, zone: string): boolean {
  if (filter.unsupported) return false
  if (filter.component !== null && componentKind(task) !== filter.component) return false
  return filter.range === undefined || overlaps(task, filter.range, zone)
}
