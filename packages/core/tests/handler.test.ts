/**
 * CalDAVHandler: request/response level tests against a published store.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { CacheStore } from '../src/cache/store.js'
import { computeEtag } from '../src/cache/snapshot.js'
import { CalDAVHandler, parseDepth, type DavResponse } from '../src/caldav/handler.js'
import { davError, davStatusResponse, escapeXml } from '../src/caldav/xml.js'
import { encodeCalendar, encodeCombined, encodeTask } from '../src/ical/codec.js'
import { ProtocolRequestError } from '../src/errors.js'
import { EVENT_TASK, PROJECT, TODO_TASK, basicAuth } from './fixtures.js'

const SYNCED_AT = '2024-06-01T12:00:00.000Z'
const AUTH = basicAuth('alice', 'test-secret')

const XML_TYPE = 'application/xml; charset=utf-8'
const CALENDAR_TYPE = 'text/calendar; charset=utf-8'

const TODO_ICS = encodeTask(PROJECT, TODO_TASK)
const EVENT_ICS = encodeTask(PROJECT, EVENT_TASK)
const CALENDAR_ICS = encodeCalendar(PROJECT, [TODO_TASK, EVENT_TASK])
const CALENDAR_ETAG = computeEtag(CALENDAR_ICS)

interface RequestOptions {
  headers?: Record<string, string>
  body?: string
  auth?: boolean
}

function hrefs(response: DavResponse): string[] {
  return Array.from(response.body.matchAll(/<D:response><D:href>([^<]*)<\/D:href>/g), (match) => match[1] ?? '')
}

function calendarQuery(inner: string, prop = '<D:getetag/>'): string {
  return (
    '<C:calendar-query xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav">' +
    `<D:prop>${prop}</D:prop><C:filter><C:comp-filter name="VCALENDAR">${inner}</C:comp-filter></C:filter>` +
    '</C:calendar-query>'
  )
}

function syncCollection(token: string): string {
  return (
    '<D:sync-collection xmlns:D="DAV:">' +
    `<D:sync-token>${token}</D:sync-token><D:sync-level>1</D:sync-level>` +
    '<D:prop><D:getetag/></D:prop></D:sync-collection>'
  )
}

describe('CalDAVHandler', () => {
  let store: CacheStore
  let handler: CalDAVHandler
  let ctag: string

  function request(method: string, path: string, init: RequestOptions = {}): DavResponse {
    const headers: Record<string, string> = { ...init.headers }
    if (init.auth !== false) headers.authorization = AUTH
    return handler.handle({ method, path, headers, body: init.body ?? '' })
  }

  beforeEach(() => {
    store = new CacheStore({ epoch: 'e1' })
    store.publish({
      calendars: [{ kind: 'fresh', project: PROJECT, tasks: [TODO_TASK, EVENT_TASK] }],
      completedAt: SYNCED_AT,
    })
    ctag = store.current().calendars.get('p1')?.ctag ?? ''
    handler = new CalDAVHandler({
      store,
      username: 'alice',
      password: 'test-secret',
      publicTokens: ['feed-token'],
    })
  })

  // -------------------------------------------------------------------
  // Routing and authentication
  // -------------------------------------------------------------------

  describe('routing', () => {
    it('answers OPTIONS without credentials', () => {
      expect(request('OPTIONS', '/calendars/p1/', { auth: false })).toEqual({
        status: 200,
        headers: {
          Allow: 'OPTIONS, GET, HEAD, PROPFIND, REPORT',
          'Content-Length': '0',
          DAV: '1, 3, calendar-access',
        },
        body: '',
      })
    })

    it('redirects the well-known URL to the root', () => {
      const response = request('PROPFIND', '/.well-known/caldav', { auth: false })
      expect(response.status).toBe(301)
      expect(response.headers.Location).toBe('/')
    })

    it('challenges requests without credentials before resolving the path', () => {
      const response = request('PROPFIND', '/calendars/nope/', { auth: false })
      expect(response.status).toBe(401)
      expect(response.headers['WWW-Authenticate']).toBe('Basic realm="taskdav", charset="UTF-8"')
    })

    it('rejects a wrong password', () => {
      const response = request('GET', '/calendars/p1/t1.ics', {
        auth: false,
        headers: { authorization: basicAuth('alice', 'nope') },
      })
      expect(response.status).toBe(401)
    })

    it('refuses every write method', () => {
      for (const method of ['PUT', 'DELETE', 'PROPPATCH', 'MKCALENDAR', 'MOVE']) {
        const response = request(method, '/calendars/p1/t1.ics', { body: 'BEGIN:VCALENDAR' })
        expect(response.status, method).toBe(403)
        expect(response.body).toBe('This CalDAV server is read-only')
      }
    })

    it('rejects methods it does not know', () => {
      expect(request('TRACE', '/').status).toBe(405)
    })

    it('adds the DAV header to every response', () => {
      expect(request('GET', '/nowhere').headers.DAV).toBe('1, 3, calendar-access')
      expect(request('GET', '/', { auth: false }).headers.DAV).toBe('1, 3, calendar-access')
    })
  })

  // -------------------------------------------------------------------
  // PROPFIND
  // -------------------------------------------------------------------

  describe('PROPFIND', () => {
    it('reports the current user principal', () => {
      const response = request('PROPFIND', '/', {
        headers: { depth: '0' },
        body: '<D:propfind xmlns:D="DAV:"><D:prop><D:current-user-principal/></D:prop></D:propfind>',
      })

      expect(response.status).toBe(207)
      expect(response.headers['Content-Type']).toBe(XML_TYPE)
      expect(response.body).toContain(
        '<D:response><D:href>/</D:href><D:propstat><D:prop>' +
          '<D:current-user-principal><D:href>/principals/alice/</D:href></D:current-user-principal>' +
          '</D:prop><D:status>HTTP/1.1 200 OK</D:status></D:propstat></D:response>',
      )
    })

    it('includes members at depth 1 and reports missing properties as 404', () => {
      const response = request('PROPFIND', '/calendars/', {
        headers: { depth: '1' },
        body: '<D:propfind xmlns:D="DAV:"><D:prop><D:getetag/></D:prop></D:propfind>',
      })

      expect(hrefs(response)).toEqual(['/calendars/', '/calendars/p1/'])
      expect(response.body).toContain(
        '<D:response><D:href>/calendars/</D:href><D:propstat><D:prop><D:getetag/></D:prop>' +
          '<D:status>HTTP/1.1 404 Not Found</D:status></D:propstat></D:response>',
      )
      expect(response.body).toContain(`<D:getetag>${escapeXml(CALENDAR_ETAG)}</D:getetag>`)
    })

    it('exposes calendar collection properties', () => {
      const response = request('PROPFIND', '/calendars/p1/', {
        body:
          '<D:propfind xmlns:D="DAV:" xmlns:CS="http://calendarserver.org/ns/" xmlns:A="http://apple.com/ns/ical/">' +
          '<D:prop><D:displayname/><CS:getctag/><D:sync-token/><A:calendar-color/></D:prop></D:propfind>',
      })

      expect(response.body).toContain(
        '<D:propstat><D:prop><D:displayname>Website</D:displayname>' +
          `<CS:getctag>${ctag}</CS:getctag>` +
          '<D:sync-token>urn:taskdav:sync:e1:1</D:sync-token></D:prop>' +
          '<D:status>HTTP/1.1 200 OK</D:status></D:propstat>' +
          '<D:propstat><D:prop><A:calendar-color/></D:prop>' +
          '<D:status>HTTP/1.1 404 Not Found</D:status></D:propstat>',
      )
    })

    it('returns all properties for an empty body but no calendar-data', () => {
      const response = request('PROPFIND', '/calendars/p1/t1.ics')

      expect(response.body).toContain(`<D:getcontenttype>${CALENDAR_TYPE}</D:getcontenttype>`)
      expect(response.body).toContain(`<D:getetag>${escapeXml(computeEtag(TODO_ICS))}</D:getetag>`)
      expect(response.body).not.toContain('calendar-data')
    })

    it('refuses Depth: infinity', () => {
      const response = request('PROPFIND', '/', { headers: { depth: 'infinity' } })
      expect(response.status).toBe(403)
      expect(response.body).toBe(davError('propfind-finite-depth'))
    })

    it('answers 404 for unknown paths', () => {
      const response = request('PROPFIND', '/calendars/p9/')
      expect(response.status).toBe(404)
      expect(response.body).toBe('Not Found')
    })

    it('answers 400 for a malformed body', () => {
      expect(request('PROPFIND', '/', { body: '<D:propfind xmlns:D="DAV:">' }).status).toBe(400)
    })
  })

  describe('parseDepth', () => {
    it('accepts 0 and 1 only', () => {
      expect(parseDepth(undefined)).toBe(0)
      expect(parseDepth('1')).toBe(1)
      expect(() => parseDepth('2')).toThrow(ProtocolRequestError)
    })
  })

  // -------------------------------------------------------------------
  // REPORT
  // -------------------------------------------------------------------

  describe('REPORT', () => {
    it('filters calendar-query by component', () => {
      const response = request('REPORT', '/calendars/p1/', {
        body: calendarQuery('<C:comp-filter name="VTODO"/>'),
      })

      expect(response.status).toBe(207)
      expect(hrefs(response)).toEqual(['/calendars/p1/t1.ics'])
      expect(response.body).toContain(`<D:getetag>${escapeXml(computeEtag(TODO_ICS))}</D:getetag>`)
    })

    it('filters calendar-query by time range', () => {
      const inRange = request('REPORT', '/calendars/p1/', {
        body: calendarQuery(
          '<C:comp-filter name="VEVENT"><C:time-range start="20240601T000000Z" end="20240602T000000Z"/></C:comp-filter>',
        ),
      })
      const outOfRange = request('REPORT', '/calendars/p1/', {
        body: calendarQuery(
          '<C:comp-filter name="VEVENT"><C:time-range start="20240602T000000Z" end="20240603T000000Z"/></C:comp-filter>',
        ),
      })

      expect(hrefs(inRange)).toEqual(['/calendars/p1/t2.ics'])
      expect(hrefs(outOfRange)).toEqual([])
    })

    it('returns calendar data for multiget hrefs and 404 for unknown ones', () => {
      const response = request('REPORT', '/calendars/p1/', {
        body:
          '<C:calendar-multiget xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav">' +
          '<D:prop><C:calendar-data/></D:prop>' +
          '<D:href>https://dav.example.test/calendars/p1/t2.ics</D:href>' +
          '<D:href>/calendars/p1/missing.ics</D:href>' +
          '</C:calendar-multiget>',
      })

      expect(hrefs(response)).toEqual(['https://dav.example.test/calendars/p1/t2.ics', '/calendars/p1/missing.ics'])
      expect(response.body).toContain(`<C:calendar-data>${escapeXml(EVENT_ICS)}</C:calendar-data>`)
      expect(response.body).toContain(davStatusResponse('/calendars/p1/missing.ics', 404))
    })

    it('lists every member for an initial sync-collection', () => {
      const response = request('REPORT', '/calendars/p1/', { body: syncCollection('') })

      expect(hrefs(response)).toEqual(['/calendars/p1/t1.ics', '/calendars/p1/t2.ics'])
      expect(response.body).toContain('<D:sync-token>urn:taskdav:sync:e1:1</D:sync-token></D:multistatus>')
    })

    it('returns only changes since the sync token', () => {
      store.publish({
        calendars: [{ kind: 'fresh', project: PROJECT, tasks: [{ ...EVENT_TASK, title: 'Moved' }] }],
        completedAt: '2024-06-01T12:05:00.000Z',
      })

      const response = request('REPORT', '/calendars/p1/', { body: syncCollection('urn:taskdav:sync:e1:1') })

      expect(hrefs(response)).toEqual(['/calendars/p1/t2.ics', '/calendars/p1/t1.ics'])
      expect(response.body).toContain(davStatusResponse('/calendars/p1/t1.ics', 404))
      expect(response.body).toContain('<D:sync-token>urn:taskdav:sync:e1:2</D:sync-token>')
    })

    it('rejects a token from another server instance', () => {
      const response = request('REPORT', '/calendars/p1/', { body: syncCollection('urn:taskdav:sync:zz:1') })
      expect(response.status).toBe(403)
      expect(response.body).toBe(davError('valid-sync-token'))
    })

    it('only runs reports on calendar collections', () => {
      const response = request('REPORT', '/calendars/', { body: syncCollection('') })
      expect(response.status).toBe(403)
      expect(response.body).toBe(davError('supported-report'))
    })

    it('refuses unknown reports', () => {
      const response = request('REPORT', '/calendars/p1/', { body: '<D:expand-property xmlns:D="DAV:"/>' })
      expect(response.status).toBe(403)
      expect(response.body).toBe(davError('supported-report'))
    })

    it('requires a well-formed body', () => {
      expect(request('REPORT', '/calendars/p1/').status).toBe(400)
      expect(request('REPORT', '/calendars/p1/', { body: '<C:calendar-query' }).status).toBe(400)
    })
  })

  // -------------------------------------------------------------------
  // GET / HEAD
  // -------------------------------------------------------------------

  describe('GET', () => {
    it('serves a calendar object with validators', () => {
      const response = request('GET', '/calendars/p1/t1.ics')

      expect(response.status).toBe(200)
      expect(response.body).toBe(TODO_ICS)
      expect(response.headers['Content-Type']).toBe(CALENDAR_TYPE)
      expect(response.headers.ETag).toBe(computeEtag(TODO_ICS))
      expect(response.headers['Last-Modified']).toBe('Thu, 02 May 2024 09:30:00 GMT')
    })

    it('answers 304 when the entity tag matches', () => {
      const etag = computeEtag(TODO_ICS)
      for (const header of [etag, `W/${etag}`, '*']) {
        const response = request('GET', '/calendars/p1/t1.ics', { headers: { 'if-none-match': header } })
        expect(response.status, header).toBe(304)
        expect(response.body).toBe('')
      }
    })

    it('sends headers without a body for HEAD', () => {
      const response = request('HEAD', '/calendars/p1/t2.ics')
      expect(response.status).toBe(200)
      expect(response.body).toBe('')
      expect(response.headers.ETag).toBe(computeEtag(EVENT_ICS))
      expect(response.headers['Last-Modified']).toBe('Sat, 01 Jun 2024 12:00:00 GMT')
    })

    it('serves the whole calendar from the collection and calendar.ics', () => {
      for (const path of ['/calendars/p1/', '/calendars/p1/calendar.ics']) {
        const response = request('GET', path)
        expect(response.body, path).toBe(CALENDAR_ICS)
        expect(response.headers.ETag).toBe(CALENDAR_ETAG)
      }
    })

    it('changes the calendar entity tag when only the project details change', () => {
      const renamed = { ...PROJECT, description: 'Launch plan' }
      store.publish({
        calendars: [{ kind: 'fresh', project: renamed, tasks: [TODO_TASK, EVENT_TASK] }],
        completedAt: '2024-06-01T12:05:00.000Z',
      })

      const response = request('GET', '/calendars/p1/calendar.ics', { headers: { 'if-none-match': CALENDAR_ETAG } })
      const body = encodeCalendar(renamed, [TODO_TASK, EVENT_TASK])

      expect(store.current().calendars.get('p1')?.ctag).toBe(ctag)
      expect(response.status).toBe(200)
      expect(response.body).toBe(body)
      expect(response.headers.ETag).toBe(computeEtag(body))
    })

    it('has no body for other collections', () => {
      const response = request('GET', '/principals/alice/')
      expect(response.status).toBe(405)
      expect(response.headers.Allow).toBe('OPTIONS, PROPFIND')
    })
  })

  // -------------------------------------------------------------------
  // Public subscriptions
  // -------------------------------------------------------------------

  describe('subscriptions', () => {
    it('serves a project feed for a known token without Basic auth', () => {
      const response = request('GET', '/subscribe/feed-token/p1.ics', { auth: false })
      expect(response.status).toBe(200)
      expect(response.body).toBe(CALENDAR_ICS)
      expect(response.headers.ETag).toBe(CALENDAR_ETAG)
    })

    it('serves the combined feed', () => {
      const response = request('GET', '/subscribe/feed-token/all.ics', { auth: false })
      const expected = encodeCombined('All projects', [{ project: PROJECT, tasks: [TODO_TASK, EVENT_TASK] }])
      expect(response.body).toBe(expected)
      expect(response.headers.ETag).toBe(computeEtag(expected))
    })

    it('rejects unknown tokens', () => {
      const response = request('GET', '/subscribe/wrong/p1.ics', { auth: false })
      expect(response.status).toBe(403)
    })

    it('answers 404 for unknown feeds and paths', () => {
      expect(request('GET', '/subscribe/feed-token/p9.ics', { auth: false }).status).toBe(404)
      expect(request('GET', '/subscribe/feed-token', { auth: false }).status).toBe(404)
    })

    it('is read-only', () => {
      const response = request('PUT', '/subscribe/feed-token/p1.ics', { auth: false })
      expect(response.status).toBe(405)
      expect(response.headers.Allow).toBe('GET, HEAD')
    })
  })
})
