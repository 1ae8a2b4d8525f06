/**
 * Live properties of each resource kind.
 *
 * Values are rendered as inner XML, already escaped. `calendar-data` is
 * only offered inside REPORT responses.
 */

import { DateTime } from 'luxon'
import type { CacheStore } from '../cache/store.js'
import { computeEtag, type CalendarEntry } from '../cache/snapshot.js'
import { encodeCalendar, type CodecOptions } from '../ical/codec.js'
import { htmlToText } from '../ical/html.js'
import type { ResourceNode } from '../tree/resource-tree.js'
import { CALENDAR_HOME_HREF, PRINCIPALS_HREF, principalHref } from '../tree/paths.js'
import { CALDAV_NS, CALSERVER_NS, DAV_NS, escapeXml, propKey, type PropName } from './xml.js'

export const CALENDAR_CONTENT_TYPE = 'text/calendar; charset=utf-8'

export interface PropertyContext {
  store: CacheStore
  username: string
  codec: CodecOptions
  /** Add `calendar-data` to event properties */
  calendarData?: boolean
}

export interface Property {
  name: PropName
  /** Inner XML */
  value: string
}

const dav = (name: string): PropName => ({ ns: DAV_NS, name })
const caldav = (name: string): PropName => ({ ns: CALDAV_NS, name })

export const PROP = {
  resourcetype: dav('resourcetype'),
  displayname: dav('displayname'),
  currentUserPrincipal: dav('current-user-principal'),
  currentUserPrivilegeSet: dav('current-user-privilege-set'),
  principalUrl: dav('principal-URL'),
  principalCollectionSet: dav('principal-collection-set'),
  owner: dav('owner'),
  getetag: dav('getetag'),
  getcontenttype: dav('getcontenttype'),
  getcontentlength: dav('getcontentlength'),
  getlastmodified: dav('getlastmodified'),
  syncToken: dav('sync-token'),
  supportedReportSet: dav('supported-report-set'),
  calendarHomeSet: caldav('calendar-home-set'),
  calendarDescription: caldav('calendar-description'),
  supportedCalendarComponentSet: caldav('supported-calendar-component-set'),
  calendarData: caldav('calendar-data'),
  getctag: { ns: CALSERVER_NS, name: 'getctag' },
} satisfies Record<string, PropName>

const READ_PRIVILEGES =
  '<D:privilege><D:read/></D:privilege><D:privilege><D:read-current-user-privilege-set/></D:privilege>'

const SUPPORTED_REPORTS = ['C:calendar-query', 'C:calendar-multiget', 'D:sync-collection']
  .map((report) => `<D:supported-report><D:report><${report}/></D:report></D:supported-report>`)
  .join('')

function href(value: string): string {
  return `<D:href>${escapeXml(value)}</D:href>`
}

export function httpDate(iso: string | null | undefined): string | undefined {
  if (!iso) return undefined
  const dt = DateTime.fromISO(iso, { zone: 'utc' })
  return dt.isValid ? dt.toHTTP() ?? undefined : undefined
}

export function calendarIcs(calendar: CalendarEntry, codec: CodecOptions): string {
  return encodeCalendar(
    calendar.project,
    Array.from(calendar.events.values(), (entry) => entry.task),
    codec,
  )
}

/**
 * Entity tag of a calendar's aggregate `.ics` (and of the collection).
 * Covers the whole body, so it also changes with the project name and
 * description, which the ctag leaves out.
 */
export function calendarEtag(calendar: CalendarEntry, codec: CodecOptions): string {
  return computeEtag(calendarIcs(calendar, codec))
}

/**
 * Every property the node exposes, in a stable order.
 */
export function nodeProperties(node: ResourceNode, ctx: PropertyContext): Property[] {
  const principal = principalHref(ctx.username)
  const props: Property[] = []
  const add = (name: PropName, value: string | undefined) => {
    if (value !== undefined) props.push({ name, value })
  }

  switch (node.kind) {
    case 'root':
      add(PROP.resourcetype, '<D:collection/>')
      add(PROP.displayname, 'taskdav')
      add(PROP.principalCollectionSet, href(PRINCIPALS_HREF))
      break
    case 'principals':
      add(PROP.resourcetype, '<D:collection/>')
      add(PROP.displayname, 'Principals')
      break
    case 'principal':
      add(PROP.resourcetype, '<D:collection/><D:principal/>')
      add(PROP.displayname, escapeXml(node.username))
      add(PROP.principalUrl, href(principal))
      add(PROP.calendarHomeSet, href(CALENDAR_HOME_HREF))
      add(PROP.principalCollectionSet, href(PRINCIPALS_HREF))
      break
    case 'calendar-home':
      add(PROP.resourcetype, '<D:collection/>')
      add(PROP.displayname, 'Calendars')
      add(PROP.owner, href(principal))
      break
    case 'calendar': {
      const { calendar } = node
      const description = calendar.project.description ? htmlToText(calendar.project.description) : ''
      add(PROP.resourcetype, '<D:collection/><C:calendar/>')
      add(PROP.displayname, escapeXml(calendar.project.name))
      add(PROP.calendarDescription, description ? escapeXml(description) : undefined)
      add(PROP.owner, href(principal))
      add(PROP.getctag, escapeXml(calendar.ctag))
      add(PROP.getetag, escapeXml(calendarEtag(calendar, ctx.codec)))
      add(PROP.syncToken, escapeXml(ctx.store.syncToken(calendar)))
      add(PROP.supportedCalendarComponentSet, '<C:comp name="VEVENT"/><C:comp name="VTODO"/>')
      add(PROP.supportedReportSet, SUPPORTED_REPORTS)
      add(PROP.getlastmodified, httpDate(calendar.syncedAt))
      break
    }
    case 'calendar-file': {
      const ics = calendarIcs(node.calendar, ctx.codec)
      add(PROP.resourcetype, '')
      add(PROP.displayname, escapeXml(node.calendar.project.name))
      add(PROP.getetag, escapeXml(computeEtag(ics)))
      add(PROP.getcontenttype, CALENDAR_CONTENT_TYPE)
      add(PROP.getcontentlength, String(Buffer.byteLength(ics, 'utf-8')))
      add(PROP.getlastmodified, httpDate(node.calendar.syncedAt))
      break
    }
    case 'event': {
      const { event } = node
      add(PROP.resourcetype, '')
      add(PROP.displayname, escapeXml(event.task.title))
      add(PROP.getetag, escapeXml(event.etag))
      add(PROP.getcontenttype, CALENDAR_CONTENT_TYPE)
      add(PROP.getcontentlength, String(Buffer.byteLength(event.ics, 'utf-8')))
      add(PROP.getlastmodified, httpDate(event.task.modifiedAt ?? node.calendar.syncedAt))
      if (ctx.calendarData) add(PROP.calendarData, escapeXml(event.ics))
      break
    }
  }

  add(PROP.currentUserPrincipal, href(principal))
  add(PROP.currentUserPrivilegeSet, READ_PRIVILEGES)
  return props
}

/**
 * Split `requested` into properties the node has and names it does not.
 */
export function selectProperties(
  available: Property[],
  requested: PropName[],
): { found: Property[]; missing: PropName[] } {
  const byKey = new Map<string, Property>(available.map((prop) => [propKey(prop.name), prop]))
  const found: Property[] = []
  const missing: PropName[] = []
  for (const name of requested) {
    const prop = byKey.get(propKey(name))
    if (prop) found.push(prop)
    else missing.push(name)
  }
  return { found, missing }
}
