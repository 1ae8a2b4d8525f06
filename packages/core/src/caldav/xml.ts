/**
 * WebDAV XML
 *
 * Request bodies are validated and parsed with fast-xml-parser, then turned
 * into a small namespace-resolved element tree. Responses are built as
 * strings: multistatus documents have a fixed shape and every value that
 * goes into them passes through `escapeXml`.
 *
 * @module caldav/xml
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { ProtocolRequestError } from '../errors.js'

export const DAV_NS = 'DAV:'
export const CALDAV_NS = 'urn:ietf:params:xml:ns:caldav'
export const CALSERVER_NS = 'http://calendarserver.org/ns/'
export const APPLE_ICAL_NS = 'http://apple.com/ns/ical/'

const PREFIXES: Record<string, string> = {
  [DAV_NS]: 'D',
  [CALDAV_NS]: 'C',
  [CALSERVER_NS]: 'CS',
  [APPLE_ICAL_NS]: 'A',
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>'

// ─────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────

export interface XmlElement {
  ns: string
  name: string
  attrs: Record<string, string>
  children: XmlElement[]
  text: string
}

/** Namespace-qualified element name */
export interface PropName {
  ns: string
  name: string
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readAttributes(node: Record<string, unknown>): Record<string, string> {
  const raw = node[':@']
  const attrs: Record<string, string> = {}
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      attrs[key] = String(value)
    }
  }
  return attrs
}

function convert(nodes: unknown, scope: ReadonlyMap<string, string>): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = []
  let text = ''
  if (!Array.isArray(nodes)) return { elements, text }

  for (const node of nodes) {
    if (!isRecord(node)) continue
    const key = Object.keys(node).find((name) => name !== ':@')
    if (key === undefined || key.startsWith('?')) continue
    if (key === '#text') {
      text += String(node[key])
      continue
    }

    const attrs = readAttributes(node)
    const inner = new Map(scope)
    for (const [attr, value] of Object.entries(attrs)) {
      if (attr === 'xmlns') inner.set('', value)
      else if (attr.startsWith('xmlns:')) inner.set(attr.slice(6), value)
    }

    const colon = key.indexOf(':')
    const prefix = colon === -1 ? '' : key.slice(0, colon)
    const name = colon === -1 ? key : key.slice(colon + 1)
    const content = convert(node[key], inner)

    elements.push({
      ns: inner.get(prefix) ?? '',
      name,
      attrs,
      children: content.elements,
      text: content.text,
    })
  }

  return { elements, text }
}

/**
 * Parse a request body into its root element.
 *
 * @throws ProtocolRequestError (400) when the body is not well-formed XML
 */
export function parseXml(body: string): XmlElement {
  const validation = XMLValidator.validate(body)
  if (validation !== true) {
    const { msg, line } = validation.err
    throw new ProtocolRequestError(`Malformed XML body (line ${line}): ${msg}`)
  }

  const root = convert(parser.parse(body), new Map()).elements[0]
  if (!root) {
    throw new ProtocolRequestError('XML body has no root element')
  }
  return root
}

export function isElement(element: XmlElement, ns: string, name: string): boolean {
  return element.ns === ns && element.name === name
}

export function findChild(element: XmlElement, ns: string, name: string): XmlElement | undefined {
  return element.children.find((child) => isElement(child, ns, name))
}

export function findChildren(element: XmlElement, ns: string, name: string): XmlElement[] {
  return element.children.filter((child) => isElement(child, ns, name))
}

/** Depth-first search below `element` */
export function findDescendant(element: XmlElement, ns: string, name: string): XmlElement | undefined {
  for (const child of element.children) {
    if (isElement(child, ns, name)) return child
    const found = findDescendant(child, ns, name)
    if (found) return found
  }
  return undefined
}

// ─────────────────────────────────────────────────────────────────
// Building
// ─────────────────────────────────────────────────────────────────

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

export function propKey(prop: PropName): string {
  return `{${prop.ns}}${prop.name}`
}

/**
 * Serialize a property element. Known namespaces use the prefixes declared
 * on the multistatus root; anything else declares its own.
 */
export function propElement(prop: PropName, inner = ''): string {
  const prefix = PREFIXES[prop.ns]
  if (prefix) {
    return inner ? `<${prefix}:${prop.name}>${inner}</${prefix}:${prop.name}>` : `<${prefix}:${prop.name}/>`
  }
  const open = `X:${prop.name} xmlns:X="${escapeXml(prop.ns)}"`
  return inner ? `<${open}>${inner}</X:${prop.name}>` : `<${open}/>`
}

export interface Propstat {
  status: number
  props: string[]
}

const REASONS: Record<number, string> = {
  200: 'OK',
  403: 'Forbidden',
  404: 'Not Found',
}

export function statusLine(status: number): string {
  return `HTTP/1.1 ${status} ${REASONS[status] ?? ''}`.trimEnd()
}

/**
 * Build a single <D:response> element.
 */
export function davResponse(href: string, propstats: Propstat[]): string {
  const blocks = propstats
    .filter((propstat) => propstat.props.length > 0)
    .map(
      (propstat) =>
        `<D:propstat><D:prop>${propstat.props.join('')}</D:prop>` +
        `<D:status>${statusLine(propstat.status)}</D:status></D:propstat>`,
    )
  return `<D:response><D:href>${escapeXml(href)}</D:href>${blocks.join('')}</D:response>`
}

/** Response for a member that has no properties to report (e.g. removed) */
export function davStatusResponse(href: string, status: number): string {
  return `<D:response><D:href>${escapeXml(href)}</D:href><D:status>${statusLine(status)}</D:status></D:response>`
}

export function multistatus(responses: string[], syncToken?: string): string {
  const token = syncToken === undefined ? '' : `<D:sync-token>${escapeXml(syncToken)}</D:sync-token>`
  return (
    `${XML_DECLARATION}\n` +
    `<D:multistatus xmlns:D="${DAV_NS}" xmlns:C="${CALDAV_NS}" xmlns:CS="${CALSERVER_NS}" xmlns:A="${APPLE_ICAL_NS}">` +
    `${responses.join('')}${token}</D:multistatus>`
  )
}

/** DAV:error body naming a precondition (RFC 4918 §16) */
export function davError(precondition: string, ns: string = DAV_NS): string {
  const element = ns === CALDAV_NS ? `<C:${precondition}/>` : `<D:${precondition}/>`
  return `${XML_DECLARATION}\n<D:error xmlns:D="${DAV_NS}" xmlns:C="${CALDAV_NS}">${element}</D:error>`
}
