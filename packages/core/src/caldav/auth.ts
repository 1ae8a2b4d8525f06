/**
 * HTTP Basic credentials check for the CalDAV surface.
 */

import { createHash, timingSafeEqual } from 'node:crypto'

export interface BasicCredentials {
  username: string
  password: string
}

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header) return null
  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header)
  if (!match) return null

  const decoded = Buffer.from(match[1], 'base64').toString('utf-8')
  const colon = decoded.indexOf(':')
  if (colon === -1) return null
  return { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest()
}

/** Constant-time comparison of two secrets of any length */
export function secretsEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b))
}

export function checkCredentials(header: string | undefined, expected: BasicCredentials): boolean {
  const given = parseBasicAuth(header)
  if (!given) return false
  // both comparisons always run
  const userOk = secretsEqual(given.username, expected.username)
  const passOk = secretsEqual(given.password, expected.password)
  return userOk && passOk
}
