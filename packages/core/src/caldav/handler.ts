/**
 * CalDAVHandler: transport-independent WebDAV/CalDAV request handling.
 *
 * Each request reads `store.current()` once and works against that snapshot
 * to the end, so a publish in the middle of a response cannot mix old and
 * new data. Nothing here touches the upstream service.
 *
 * Processing order:
 *   OPTIONS → /.well-known/caldav → /subscribe/{token}/… → Basic auth →
 *   read-only guard → resolve → method dispatch
 *
 * @module caldav/handler
 */

import { computeEtag, type CalendarEntry, type Snapshot } from '../cache/snapshot.js'
import type { CacheStore } from '../cache/store.js'
import { encodeCombined, type CodecOptions } from '../ical/codec.js'
import { AuthFailureError, NotFoundError, ProtocolRequestError, StaleTokenError } from '../errors.js'
import { silentLogger, type Logger } from '../logger.js'
import { children, hrefOf, resolve, type ResourceNode, type TreeOptions } from '../tree/resource-tree.js'
import { ICS_SUFFIX, splitPath } from '../tree/paths.js'
import { checkCredentials, secretsEqual } from './auth.js'
import {
  CALENDAR_CONTENT_TYPE,
  PROP,
  calendarIcs,
  httpDate,
  nodeProperties,
  selectProperties,
  type Property,
  type PropertyContext,
} from './properties.js'
import { matchesFilter, parseFilter } from './time-range.js'
import {
  CALDAV_NS,
  DAV_NS,
  davError,
  davResponse,
  davStatusResponse,
  findChild,
  findChildren,
  isElement,
  multistatus,
  parseXml,
  propElement,
  type PropName,
  type Propstat,
  type XmlElement,
} from './xml.js'

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export interface DavRequest {
  method: string
  /** Request target; a query string is ignored */
  path: string
  /** Lower-case header names */
  headers: Record<string, string | undefined>
  body: string
}

export interface DavResponse {
  status: number
  headers: Record<string, string>
  body: string
}

export interface CalDAVHandlerOptions {
  store: CacheStore
  username: string
  password: string
  realm?: string
  /** Tokens accepted on /subscribe/{token}/… */
  publicTokens?: readonly string[]
  /** Zone in which all-day tasks are placed for time-range queries */
  timezone?: string
  codec?: CodecOptions
  /** X-WR-CALNAME of the combined public feed */
  combinedName?: string
  logger?: Logger
}

type PropfindQuery = { mode: 'allprop' } | { mode: 'propname' } | { mode: 'prop'; names: PropName[] }

const ALLOW = 'OPTIONS, GET, HEAD, PROPFIND, REPORT'
const DAV_CAPABILITIES = '1, 3, calendar-access'
const XML_CONTENT_TYPE = 'application/xml; charset=utf-8'
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8'

const WRITE_METHODS = new Set([
  'PUT',
  'DELETE',
  'PATCH',
  'POST',
  'PROPPATCH',
  'MKCALENDAR',
  'MKCOL',
  'MOVE',
  'COPY',
  'LOCK',
  'UNLOCK',
])

const WELL_KNOWN = ['.well-known', 'caldav']
const SUBSCRIBE = 'subscribe'
const COMBINED_FILE = 'all.ics'

// ─────────────────────────────────────────────────────────────────
// CalDAVHandler
// ─────────────────────────────────────────────────────────────────

export class CalDAVHandler {
  private store: CacheStore
  private credentials: { username: string; password: string }
  private realm: string
  private publicTokens: readonly string[]
  private timezone: string
  private codec: CodecOptions
  private combinedName: string
  private tree: TreeOptions
  private log: Logger

  constructor(options: CalDAVHandlerOptions) {
    this.store = options.store
    this.credentials = { username: options.username, password: options.password }
    this.realm = options.realm ?? 'taskdav'
    this.publicTokens = (options.publicTokens ?? []).filter((token) => token !== '')
    this.timezone = options.timezone ?? 'UTC'
    this.codec = options.codec ?? {}
    this.combinedName = options.combinedName ?? 'All projects'
    this.tree = { username: options.username }
    this.log = (options.logger ?? silentLogger()).child({ module: 'caldav' })
  }

  handle(request: DavRequest): DavResponse {
    const method = request.method.toUpperCase()
    let response: DavResponse
    try {
      response = this.route(method, request)
    } catch (err) {
      response = this.errorResponse(err)
    }
    response.headers.DAV = DAV_CAPABILITIES

    this.log.debug({ method, path: request.path, status: response.status }, 'caldav request')
    return response
  }

  // ─── Routing ───

  private route(method: string, request: DavRequest): DavResponse {
    if (method === 'OPTIONS') {
      return { status: 200, headers: { Allow: ALLOW, 'Content-Length': '0' }, body: '' }
    }

    const segments = splitPath(request.path) ?? []
    if (segments.length === 2 && segments[0] === WELL_KNOWN[0] && segments[1] === WELL_KNOWN[1]) {
      return { status: 301, headers: { Location: '/' }, body: '' }
    }

    if (segments[0] === SUBSCRIBE) {
      return this.subscribe(method, segments.slice(1), request)
    }

    if (!checkCredentials(request.headers.authorization, this.credentials)) {
      throw new AuthFailureError('Missing or invalid credentials')
    }

    if (WRITE_METHODS.has(method)) {
      return text(403, 'This CalDAV server is read-only')
    }

    const snapshot = this.store.current()
    switch (method) {
      case 'PROPFIND':
        return this.propfind(snapshot, request)
      case 'REPORT':
        return this.report(snapshot, request)
      case 'GET':
      case 'HEAD':
        return this.get(snapshot, request, method === 'HEAD')
      default:
        return { status: 405, headers: { Allow: ALLOW }, body: '' }
    }
  }

  private errorResponse(err: unknown): DavResponse {
    if (err instanceof AuthFailureError) {
      return text(401, 'Authentication required', {
        'WWW-Authenticate': `Basic realm="${this.realm}", charset="UTF-8"`,
      })
    }
    if (err instanceof NotFoundError) {
      return text(404, 'Not Found')
    }
    if (err instanceof StaleTokenError) {
      this.log.debug({ err: err.message }, 'stale sync token')
      return xml(403, davError('valid-sync-token'))
    }
    if (err instanceof ProtocolRequestError) {
      this.log.debug({ err: err.message, status: err.status }, 'rejected request')
      return err.precondition ? xml(err.status, davError(err.precondition)) : text(err.status, err.message)
    }
    throw err
  }

  // ─── PROPFIND ───

  private propfind(snapshot: Snapshot, request: DavRequest): DavResponse {
    const depth = parseDepth(request.headers.depth)
    const node = resolve(snapshot, request.path, this.tree)
    const query = parsePropfind(request.body)

    const nodes = depth === 1 ? [node, ...children(snapshot, node, this.tree)] : [node]
    const ctx = this.propertyContext(false)
    const responses = nodes.map((member) =>
      davResponse(hrefOf(member), propstats(nodeProperties(member, ctx), query)),
    )
    return xml(207, multistatus(responses))
  }

  // ─── REPORT ───

  private report(snapshot: Snapshot, request: DavRequest): DavResponse {
    const node = resolve(snapshot, request.path, this.tree)
    if (!request.body.trim()) {
      throw new ProtocolRequestError('REPORT requires a request body')
    }
    const root = parseXml(request.body)

    if (node.kind !== 'calendar') {
      throw new ProtocolRequestError('Reports are only supported on calendar collections', {
        status: 403,
        precondition: 'supported-report',
      })
    }

    const query = reportQuery(root)
    if (isElement(root, CALDAV_NS, 'calendar-query')) {
      return this.calendarQuery(node.calendar, root, query)
    }
    if (isElement(root, CALDAV_NS, 'calendar-multiget')) {
      return this.calendarMultiget(snapshot, root, query)
    }
    if (isElement(root, DAV_NS, 'sync-collection')) {
      return this.syncCollection(node.calendar, root, query)
    }
    throw new ProtocolRequestError(`Unsupported report ${root.name}`, {
      status: 403,
      precondition: 'supported-report',
    })
  }

  private calendarQuery(calendar: CalendarEntry, root: XmlElement, query: PropfindQuery): DavResponse {
    const filter = parseFilter(root)
    const ctx = this.propertyContext(true)
    const responses: string[] = []
    for (const event of calendar.events.values()) {
      if (!matchesFilter(event.task, filter, this.timezone)) continue
      const node: ResourceNode = { kind: 'event', calendar, event }
      responses.push(davResponse(event.href, propstats(nodeProperties(node, ctx), query)))
    }
    return xml(207, multistatus(responses))
  }

  private calendarMultiget(snapshot: Snapshot, root: XmlElement, query: PropfindQuery): DavResponse {
    const ctx = this.propertyContext(true)
    const responses = findChildren(root, DAV_NS, 'href').map((element) => {
      const href = element.text.trim()
      const node = this.resolveOptional(snapshot, hrefPath(href))
      if (!node || node.kind !== 'event') return davStatusResponse(href, 404)
      return davResponse(href, propstats(nodeProperties(node, ctx), query))
    })
    return xml(207, multistatus(responses))
  }

  private syncCollection(calendar: CalendarEntry, root: XmlElement, query: PropfindQuery): DavResponse {
    const token = findChild(root, DAV_NS, 'sync-token')?.text.trim() ?? ''
    const ctx = this.propertyContext(true)
    const byHref = new Map(Array.from(calendar.events.values(), (event) => [event.href, event] as const))

    let changed: string[]
    let removed: string[] = []
    if (token === '') {
      changed = Array.from(byHref.keys())
    } else {
      const changes = this.store.changesSince(calendar, token)
      changed = changes.changed
      removed = changes.removed
    }

    const responses: string[] = []
    for (const href of changed) {
      const event = byHref.get(href)
      if (!event) {
        responses.push(davStatusResponse(href, 404))
        continue
      }
      const node: ResourceNode = { kind: 'event', calendar, event }
      responses.push(davResponse(href, propstats(nodeProperties(node, ctx), query)))
    }
    for (const href of removed) {
      responses.push(davStatusResponse(href, 404))
    }

    return xml(207, multistatus(responses, this.store.syncToken(calendar)))
  }

  // ─── GET / HEAD ───

  private get(snapshot: Snapshot, request: DavRequest, head: boolean): DavResponse {
    const node = resolve(snapshot, request.path, this.tree)

    let body: string
    let etag: string
    let lastModified: string | null | undefined
    switch (node.kind) {
      case 'event':
        body = node.event.ics
        etag = node.event.etag
        lastModified = node.event.task.modifiedAt ?? node.calendar.syncedAt
        break
      case 'calendar':
      case 'calendar-file':
        body = calendarIcs(node.calendar, this.codec)
        etag = computeEtag(body)
        lastModified = node.calendar.syncedAt
        break
      default:
        return { status: 405, headers: { Allow: 'OPTIONS, PROPFIND' }, body: '' }
    }

    return calendarResponse(request, body, etag, lastModified, head)
  }

  // ─── Public subscriptions ───

  private subscribe(method: string, segments: string[], request: DavRequest): DavResponse {
    if (method !== 'GET' && method !== 'HEAD') {
      return { status: 405, headers: { Allow: 'GET, HEAD' }, body: '' }
    }

    const [token, file, ...rest] = segments
    if (token === undefined || file === undefined || rest.length > 0 || !file.endsWith(ICS_SUFFIX)) {
      throw new NotFoundError('Unknown subscription path')
    }
    if (!this.publicTokens.some((known) => secretsEqual(known, token))) {
      return text(403, 'Invalid subscription token')
    }

    const snapshot = this.store.current()

    if (file === COMBINED_FILE) {
      const entries = Array.from(snapshot.calendars.values(), (calendar) => ({
        project: calendar.project,
        tasks: Array.from(calendar.events.values(), (event) => event.task),
      }))
      const body = encodeCombined(this.combinedName, entries, this.codec)
      return calendarResponse(request, body, computeEtag(body), snapshot.syncedAt, method === 'HEAD')
    }

    const calendar = snapshot.calendars.get(file.slice(0, -ICS_SUFFIX.length))
    if (!calendar) {
      throw new NotFoundError(`Unknown calendar ${file}`)
    }
    const body = calendarIcs(calendar, this.codec)
    return calendarResponse(request, body, computeEtag(body), calendar.syncedAt, method === 'HEAD')
  }

  // ─────────────────────────────────────────────────────────────

  private propertyContext(calendarData: boolean): PropertyContext {
    return { store: this.store, username: this.credentials.username, codec: this.codec, calendarData }
  }

  private resolveOptional(snapshot: Snapshot, path: string): ResourceNode | null {
    try {
      return resolve(snapshot, path, this.tree)
    } catch (err) {
      if (err instanceof NotFoundError) return null
      throw err
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────

function text(status: number, body: string, headers: Record<string, string> = {}): DavResponse {
  return { status, headers: { 'Content-Type': TEXT_CONTENT_TYPE, ...headers }, body }
}

function xml(status: number, body: string): DavResponse {
  return { status, headers: { 'Content-Type': XML_CONTENT_TYPE }, body }
}

/**
 * `Depth` for PROPFIND. A missing header means 0.
 */
export function parseDepth(header: string | undefined): 0 | 1 {
  const value = (header ?? '').trim().toLowerCase()
  if (value === '' || value === '0') return 0
  if (value === '1') return 1
  if (value === 'infinity') {
    throw new ProtocolRequestError('Depth: infinity is not supported', {
      status: 403,
      precondition: 'propfind-finite-depth',
    })
  }
  throw new ProtocolRequestError(`Invalid Depth header "${header}"`)
}

export function parsePropfind(body: string): PropfindQuery {
  if (!body.trim()) return { mode: 'allprop' }

  const root = parseXml(body)
  if (!isElement(root, DAV_NS, 'propfind')) {
    throw new ProtocolRequestError(`Expected DAV:propfind, got ${root.name}`)
  }
  if (findChild(root, DAV_NS, 'propname')) return { mode: 'propname' }

  const prop = findChild(root, DAV_NS, 'prop')
  if (prop) {
    return { mode: 'prop', names: prop.children.map((child) => ({ ns: child.ns, name: child.name })) }
  }
  return { mode: 'allprop' }
}

/** Properties a REPORT asks for; `getetag` alone when unspecified */
function reportQuery(root: XmlElement): PropfindQuery {
  if (findChild(root, DAV_NS, 'allprop')) return { mode: 'allprop' }
  if (findChild(root, DAV_NS, 'propname')) return { mode: 'propname' }
  const prop = findChild(root, DAV_NS, 'prop')
  if (!prop) return { mode: 'prop', names: [PROP.getetag] }
  return { mode: 'prop', names: prop.children.map((child) => ({ ns: child.ns, name: child.name })) }
}

function propstats(available: Property[], query: PropfindQuery): Propstat[] {
  switch (query.mode) {
    case 'allprop':
      return [{ status: 200, props: available.map((prop) => propElement(prop.name, prop.value)) }]
    case 'propname':
      return [{ status: 200, props: available.map((prop) => propElement(prop.name)) }]
    case 'prop': {
      const { found, missing } = selectProperties(available, query.names)
      return [
        { status: 200, props: found.map((prop) => propElement(prop.name, prop.value)) },
        { status: 404, props: missing.map((name) => propElement(name)) },
      ]
    }
  }
}

/** Path part of an href that may be an absolute URL */
function hrefPath(href: string): string {
  if (/^https?:\/\//i.test(href)) {
    try {
      return new URL(href).pathname
    } catch {
      return href
    }
  }
  return href
}

function etagMatches(header: string | undefined, etag: string): boolean {
  if (!header) return false
  return header
    .split(',')
    .map((candidate) => candidate.trim().replace(/^W\//, ''))
    .some((candidate) => candidate === '*' || candidate === etag)
}

function calendarResponse(
  request: DavRequest,
  body: string,
  etag: string,
  lastModified: string | null | undefined,
  head: boolean,
): DavResponse {
  if (etagMatches(request.headers['if-none-match'], etag)) {
    return { status: 304, headers: { ETag: etag }, body: '' }
  }

  const headers: Record<string, string> = { 'Content-Type': CALENDAR_CONTENT_TYPE, ETag: etag }
  const modified = httpDate(lastModified)
  if (modified) headers['Last-Modified'] = modified
  return { status: 200, headers, body: head ? '' : body }
}
