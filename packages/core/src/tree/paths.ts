/**
 * Canonical hrefs of the resource hierarchy.
 *
 *   /                                 root
 *   /principals/                      principal collection
 *   /principals/{user}/               the principal
 *   /calendars/                       calendar home
 *   /calendars/{projectId}/           calendar collection
 *   /calendars/{projectId}/calendar.ics
 *   /calendars/{projectId}/{taskId}.ics
 */

export const ROOT_HREF = '/'
export const PRINCIPALS_HREF = '/principals/'
export const CALENDAR_HOME_HREF = '/calendars/'
export const CALENDAR_FILE = 'calendar.ics'
export const ICS_SUFFIX = '.ics'

export function principalHref(username: string): string {
  return `${PRINCIPALS_HREF}${encodeURIComponent(username)}/`
}

export function calendarHref(projectId: string): string {
  return `${CALENDAR_HOME_HREF}${encodeURIComponent(projectId)}/`
}

export function calendarFileHref(projectId: string): string {
  return `${calendarHref(projectId)}${CALENDAR_FILE}`
}

export function eventHref(projectId: string, taskId: string): string {
  return `${calendarHref(projectId)}${encodeURIComponent(taskId)}${ICS_SUFFIX}`
}

/**
 * Split a request path into percent-decoded segments. Empty segments from
 * doubled or trailing slashes are dropped. Returns null when a segment is
 * not valid percent-encoding.
 */
export function splitPath(path: string): string[] | null {
  const pathname = path.split('?')[0] ?? ''
  const segments: string[] = []
  for (const raw of pathname.split('/')) {
    if (raw === '') continue
    try {
      segments.push(decodeURIComponent(raw))
    } catch {
      return null
    }
  }
  return segments
}
