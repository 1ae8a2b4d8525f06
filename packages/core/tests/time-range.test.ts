import { describe, it, expect } from 'vitest'
import { matchesFilter, overlaps, parseFilter, parseUtcStamp } from '../src/caldav/time-range.js'
import { parseXml } from '../src/caldav/xml.js'
import { ProtocolRequestError } from '../src/errors.js'
import { EVENT_TASK, TODO_TASK, makeTask } from './fixtures.js'

const JUNE_1 = Date.UTC(2024, 5, 1)
const JUNE_2 = Date.UTC(2024, 5, 2)
const JUNE_4 = Date.UTC(2024, 5, 4)

function query(inner: string) {
  return parseXml(
    '<C:calendar-query xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav">' +
      `<C:filter><C:comp-filter name="VCALENDAR">${inner}</C:comp-filter></C:filter></C:calendar-query>`,
  )
}

describe('parseFilter', () => {
  it('reads the component and time range', () => {
    const filter = parseFilter(
      query('<C:comp-filter name="VEVENT"><C:time-range start="20240601T000000Z" end="20240602T000000Z"/></C:comp-filter>'),
    )
    expect(filter).toEqual({ component: 'VEVENT', unsupported: false, range: { start: JUNE_1, end: JUNE_2 } })
  })

  it('matches everything without a filter', () => {
    const root = parseXml('<C:calendar-query xmlns:C="urn:ietf:params:xml:ns:caldav"/>')
    expect(parseFilter(root)).toEqual({ component: null, unsupported: false })
  })

  it('flags components that are never served', () => {
    expect(parseFilter(query('<C:comp-filter name="VJOURNAL"/>')).unsupported).toBe(true)
  })

  it('rejects malformed timestamps', () => {
    expect(() => parseUtcStamp('2024-06-01')).toThrow(ProtocolRequestError)
  })
})

describe('overlaps', () => {
  it('compares timed tasks by instant', () => {
    expect(overlaps(EVENT_TASK, { start: JUNE_1, end: JUNE_2 }, 'UTC')).toBe(true)
    expect(overlaps(EVENT_TASK, { start: JUNE_2 }, 'UTC')).toBe(false)
    expect(overlaps(EVENT_TASK, { end: Date.UTC(2024, 5, 1, 9) }, 'UTC')).toBe(false)
  })

  it('places all-day tasks in the configured zone', () => {
    const range = { start: JUNE_4, end: Date.UTC(2024, 5, 4, 3) }
    // 2024-06-03 in New York ends at 2024-06-04T04:00Z
    expect(overlaps(TODO_TASK, range, 'America/New_York')).toBe(true)
    expect(overlaps(TODO_TASK, range, 'UTC')).toBe(false)
  })

  it('keeps a zero-length task that sits on the range start', () => {
    const task = makeTask({ due: '2024-06-01T00:00:00.000Z' })
    expect(overlaps(task, { start: JUNE_1, end: JUNE_2 }, 'UTC')).toBe(true)
  })

  it('matches undated tasks against any range', () => {
    expect(overlaps(makeTask(), { start: JUNE_1, end: JUNE_2 }, 'UTC')).toBe(true)
  })
})

describe('matchesFilter', () => {
  it('filters by component kind', () => {
    const todos = { component: 'VTODO' as const, unsupported: false }
    expect(matchesFilter(TODO_TASK, todos, 'UTC')).toBe(true)
    expect(matchesFilter(EVENT_TASK, todos, 'UTC')).toBe(false)
    expect(matchesFilter(EVENT_TASK, { component: null, unsupported: true }, 'UTC')).toBe(false)
  })
})
