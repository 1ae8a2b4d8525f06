/**
 * RFC 5545 content-line helpers: text escaping, line folding and
 * DATE / DATE-TIME value formatting.
 */

import { DateTime } from 'luxon'
import { isDateOnly, type TaskDate } from '../domain/types.js'

const CRLF = '\r\n'
const MAX_LINE_OCTETS = 75

/**
 * Escape text for iCalendar format
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

/** Inverse of `escapeText`, for TEXT values a parser hands back raw */
export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_match, char: string) => (char === 'n' || char === 'N' ? '\n' : char))
}

/**
 * Fold a content line at 75 octets. Continuation lines start with a single
 * space; multi-byte characters are never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) return line

  const parts: string[] = []
  let current = ''
  let currentOctets = 0
  // the leading space of a continuation line counts toward its 75 octets
  let limit = MAX_LINE_OCTETS

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8')
    if (currentOctets + octets > limit) {
      parts.push(current)
      current = ''
      currentOctets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += char
    currentOctets += octets
  }
  parts.push(current)

  return parts.join(`${CRLF} `)
}

/** Join content lines into an iCalendar stream (CRLF-terminated) */
export function serializeLines(lines: readonly string[]): string {
  return lines.map(foldLine).join(CRLF) + CRLF
}

export interface FormattedDate {
  /** Property parameters, e.g. `;VALUE=DATE`, or empty */
  params: string
  value: string
}

/** UTC instant → `20240601T093000Z` */
export function formatInstant(iso: string): string {
  return DateTime.fromISO(iso, { zone: 'utc' }).toFormat("yyyyMMdd'T'HHmmss'Z'")
}

export function formatTaskDate(value: TaskDate): FormattedDate {
  if (isDateOnly(value)) {
    return { params: ';VALUE=DATE', value: value.replace(/-/g, '') }
  }
  return { params: '', value: formatInstant(value) }
}

/**
 * All-day DTEND is exclusive (RFC 5545 §3.6.1), so a date-only due date is
 * written as the following day.
 */
export function formatExclusiveEnd(value: TaskDate): FormattedDate {
  if (isDateOnly(value)) {
    const next = DateTime.fromISO(value, { zone: 'utc' }).plus({ days: 1 })
    return { params: ';VALUE=DATE', value: next.toFormat('yyyyMMdd') }
  }
  return formatTaskDate(value)
}

/**
 * VALARM trigger for "minutes before start": PT0S, -PT15M, -PT1H, -P1D.
 */
export function formatTrigger(minutesBefore: number): string {
  if (minutesBefore === 0) return 'PT0S'
  if (minutesBefore % 1440 === 0) return `-P${minutesBefore / 1440}D`
  if (minutesBefore % 60 === 0) return `-PT${minutesBefore / 60}H`
  return `-PT${minutesBefore}M`
}
