/**
 * iCalendar Codec
 *
 * Task → VEVENT/VTODO and back. Encoding builds content lines by hand so the
 * output is byte-stable for a given input (ETags are hashes of it); decoding
 * goes through ical.js.
 */

import ICAL from 'ical.js'
import { DateTime } from 'luxon'
import { ProtocolRequestError, describeError } from '../errors.js'
import {
  isDateOnly,
  isTaskPriority,
  isTaskStatus,
  type Project,
  type Task,
  type TaskDate,
  type TaskPriority,
  type TaskStatus,
} from '../domain/types.js'
import {
  escapeText,
  formatExclusiveEnd,
  formatInstant,
  formatTaskDate,
  formatTrigger,
  serializeLines,
  unescapeText,
} from './format.js'
import { htmlToText } from './html.js'

export const PRODID = '-//taskdav//taskdav//EN'

const UID_DOMAIN = 'taskdav'

export interface CodecOptions {
  /** Attach VALARMs derived from task priority */
  alarms?: boolean
}

export type ComponentKind = 'VEVENT' | 'VTODO'

export interface DecodedTask {
  uid: string
  component: ComponentKind
  projectId?: string
  taskId?: string
  title: string
  status: TaskStatus
  description?: string
  priority?: TaskPriority
  start?: TaskDate
  due?: TaskDate
  assignee?: string
  tags: string[]
  createdAt?: string
  modifiedAt?: string
}

export interface ProjectTasks {
  project: Project
  tasks: readonly Task[]
}

// ─── Mappings ───

const TODO_STATUS: Record<TaskStatus, string> = {
  open: 'NEEDS-ACTION',
  'in-progress': 'IN-PROCESS',
  done: 'COMPLETED',
  closed: 'CANCELLED',
}

const EVENT_STATUS: Record<TaskStatus, string> = {
  open: 'CONFIRMED',
  'in-progress': 'CONFIRMED',
  done: 'COMPLETED',
  closed: 'CANCELLED',
}

const STATUS_FROM_ICAL: Record<string, TaskStatus> = {
  'NEEDS-ACTION': 'open',
  CONFIRMED: 'open',
  TENTATIVE: 'open',
  'IN-PROCESS': 'in-progress',
  COMPLETED: 'done',
  CANCELLED: 'closed',
}

const ICAL_PRIORITY: Record<TaskPriority, number> = {
  'very-high': 1,
  high: 1,
  normal: 5,
  low: 9,
  'very-low': 9,
}

interface AlarmPlan {
  action: 'AUDIO' | 'DISPLAY'
  minutesBefore: number[]
}

const ALARMS: Record<TaskPriority, AlarmPlan> = {
  'very-high': { action: 'AUDIO', minutesBefore: [0, 15, 60, 1440] },
  high: { action: 'AUDIO', minutesBefore: [0, 15, 60, 1440] },
  normal: { action: 'DISPLAY', minutesBefore: [15, 60] },
  low: { action: 'DISPLAY', minutesBefore: [60] },
  'very-low': { action: 'DISPLAY', minutesBefore: [60] },
}

// ─── Encoding ───

export function taskUid(projectId: string, taskId: string): string {
  return `${projectId}-${taskId}@${UID_DOMAIN}`
}

export function componentKind(task: Task): ComponentKind {
  return task.start && task.due ? 'VEVENT' : 'VTODO'
}

function alarmLines(task: Task): string[] {
  if (!task.start || !task.priority) return []

  const plan = ALARMS[task.priority]
  const description = escapeText(`Reminder: ${task.title}`)
  return plan.minutesBefore.flatMap((minutes) => [
    'BEGIN:VALARM',
    `ACTION:${plan.action}`,
    `TRIGGER:${formatTrigger(minutes)}`,
    `DESCRIPTION:${description}`,
    'END:VALARM',
  ])
}

function componentLines(project: Project, task: Task, options: CodecOptions): string[] {
  const kind = componentKind(task)
  const lines: string[] = [`BEGIN:${kind}`, `UID:${escapeText(taskUid(project.id, task.id))}`]

  // DTSTAMP is REQUIRED by RFC 5545, but a clock value would make the
  // output impure and any fixed value would be invented; without an
  // upstream timestamp it is left out
  const stamp = task.modifiedAt ?? task.createdAt
  if (stamp) {
    lines.push(`DTSTAMP:${formatInstant(stamp)}`)
  }

  if (task.start) {
    const start = formatTaskDate(task.start)
    lines.push(`DTSTART${start.params}:${start.value}`)
  }
  if (task.due) {
    if (kind === 'VEVENT') {
      const end = formatExclusiveEnd(task.due)
      lines.push(`DTEND${end.params}:${end.value}`)
    } else {
      const due = formatTaskDate(task.due)
      lines.push(`DUE${due.params}:${due.value}`)
    }
  }

  lines.push(`SUMMARY:${escapeText(task.title)}`)

  const description = task.description ? htmlToText(task.description) : ''
  if (description) {
    lines.push(`DESCRIPTION:${escapeText(description)}`)
  }

  lines.push(`STATUS:${kind === 'VEVENT' ? EVENT_STATUS[task.status] : TODO_STATUS[task.status]}`)

  if (task.priority) {
    lines.push(`PRIORITY:${ICAL_PRIORITY[task.priority]}`)
  }
  if (task.tags.length > 0) {
    lines.push(`CATEGORIES:${task.tags.map(escapeText).join(',')}`)
  }
  if (kind === 'VEVENT' && task.start) {
    lines.push(`TRANSP:${isDateOnly(task.start) ? 'TRANSPARENT' : 'OPAQUE'}`)
  }
  if (task.createdAt) {
    lines.push(`CREATED:${formatInstant(task.createdAt)}`)
  }
  if (task.modifiedAt) {
    lines.push(`LAST-MODIFIED:${formatInstant(task.modifiedAt)}`)
  }

  // taskdav extensions
  lines.push(`X-TASKDAV-PROJECT-ID:${escapeText(project.id)}`)
  lines.push(`X-TASKDAV-PROJECT:${escapeText(project.name)}`)
  lines.push(`X-TASKDAV-STATUS:${task.status}`)
  if (task.priority) {
    lines.push(`X-TASKDAV-PRIORITY:${task.priority}`)
  }
  if (task.assignee) {
    lines.push(`X-TASKDAV-ASSIGNEE:${escapeText(task.assignee)}`)
  }

  if (options.alarms) {
    lines.push(...alarmLines(task))
  }

  lines.push(`END:${kind}`)
  return lines
}

function calendarHeader(): string[] {
  return ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${PRODID}`, 'CALSCALE:GREGORIAN']
}

/**
 * One calendar object resource: a VCALENDAR holding exactly one component.
 */
export function encodeTask(project: Project, task: Task, options: CodecOptions = {}): string {
  return serializeLines([...calendarHeader(), ...componentLines(project, task, options), 'END:VCALENDAR'])
}

/**
 * Whole-project feed (`calendar.ics`, public subscription).
 */
export function encodeCalendar(
  project: Project,
  tasks: readonly Task[],
  options: CodecOptions = {},
): string {
  const lines = [...calendarHeader(), 'METHOD:PUBLISH', `X-WR-CALNAME:${escapeText(project.name)}`]
  if (project.description) {
    lines.push(`X-WR-CALDESC:${escapeText(htmlToText(project.description))}`)
  }
  for (const task of tasks) {
    lines.push(...componentLines(project, task, options))
  }
  lines.push('END:VCALENDAR')
  return serializeLines(lines)
}

/**
 * Several projects merged into one feed (`all.ics`).
 */
export function encodeCombined(
  name: string,
  entries: readonly ProjectTasks[],
  options: CodecOptions = {},
): string {
  const lines = [...calendarHeader(), 'METHOD:PUBLISH', `X-WR-CALNAME:${escapeText(name)}`]
  for (const { project, tasks } of entries) {
    for (const task of tasks) {
      lines.push(...componentLines(project, task, options))
    }
  }
  lines.push('END:VCALENDAR')
  return serializeLines(lines)
}

// ─── Decoding ───

type IcalComponent = InstanceType<typeof ICAL.Component>
type IcalTime = InstanceType<typeof ICAL.Time>

function textValue(component: IcalComponent, name: string): string | undefined {
  const value = component.getFirstPropertyValue(name)
  if (value === null || value === undefined) return undefined
  const text = String(value)
  return text === '' ? undefined : text
}

/** ical.js leaves X- properties escaped; they are written as TEXT */
function extensionValue(component: IcalComponent, name: string): string | undefined {
  const raw = textValue(component, name)
  return raw === undefined ? undefined : unescapeText(raw)
}

function timeToTaskDate(time: IcalTime): TaskDate | undefined {
  if (time.isDate) {
    return DateTime.fromObject({ year: time.year, month: time.month, day: time.day }).toISODate() ?? undefined
  }
  return DateTime.fromJSDate(time.toJSDate(), { zone: 'utc' }).toISO() ?? undefined
}

function dateValue(component: IcalComponent, name: string): TaskDate | undefined {
  const value = component.getFirstPropertyValue(name)
  return value instanceof ICAL.Time ? timeToTaskDate(value) : undefined
}

/** DTEND of an all-day event is exclusive; the task's due date is the day before */
function inclusiveEnd(component: IcalComponent): TaskDate | undefined {
  const end = dateValue(component, 'dtend')
  if (end === undefined || !isDateOnly(end)) return end
  return DateTime.fromISO(end, { zone: 'utc' }).minus({ days: 1 }).toISODate() ?? undefined
}

function decodeStatus(component: IcalComponent): TaskStatus {
  const exact = extensionValue(component, 'x-taskdav-status')
  if (exact && isTaskStatus(exact)) return exact
  const status = textValue(component, 'status')
  return (status && STATUS_FROM_ICAL[status.toUpperCase()]) || 'open'
}

function decodePriority(component: IcalComponent): TaskPriority | undefined {
  const exact = extensionValue(component, 'x-taskdav-priority')
  if (exact && isTaskPriority(exact)) return exact

  const raw = textValue(component, 'priority')
  const level = raw === undefined ? NaN : Number(raw)
  // RFC 5545: 1-4 high, 5 medium, 6-9 low, 0 undefined
  if (!Number.isInteger(level) || level < 1 || level > 9) return undefined
  if (level < 5) return 'high'
  return level === 5 ? 'normal' : 'low'
}

function decodeTags(component: IcalComponent): string[] {
  return component
    .getAllProperties('categories')
    .flatMap((property) => property.getValues())
    .map((value) => String(value))
    .filter((tag) => tag !== '')
}

function splitUid(uid: string, projectId: string | undefined): { projectId?: string; taskId?: string } {
  const suffix = `@${UID_DOMAIN}`
  if (!uid.endsWith(suffix)) return { projectId }
  const local = uid.slice(0, -suffix.length)

  if (projectId !== undefined) {
    const prefix = `${projectId}-`
    return local.startsWith(prefix) ? { projectId, taskId: local.slice(prefix.length) } : { projectId }
  }

  const dash = local.indexOf('-')
  if (dash <= 0) return {}
  return { projectId: local.slice(0, dash), taskId: local.slice(dash + 1) }
}

/**
 * Parse a calendar object and recover the task fields from its first
 * VEVENT or VTODO.
 */
export function decodeTask(ics: string): DecodedTask {
  let calendar: IcalComponent
  try {
    calendar = ICAL.Component.fromString(ics)
  } catch (err) {
    throw new ProtocolRequestError(`Invalid iCalendar data: ${describeError(err)}`, { cause: err })
  }

  const event = calendar.getFirstSubcomponent('vevent')
  const todo = calendar.getFirstSubcomponent('vtodo')
  const component = event ?? todo
  if (!component) {
    throw new ProtocolRequestError('Calendar object has no VEVENT or VTODO')
  }

  const uid = textValue(component, 'uid')
  if (!uid) {
    throw new ProtocolRequestError('Calendar component has no UID')
  }

  const kind: ComponentKind = event ? 'VEVENT' : 'VTODO'
  const ids = splitUid(uid, extensionValue(component, 'x-taskdav-project-id'))

  return {
    uid,
    component: kind,
    ...ids,
    title: textValue(component, 'summary') ?? '',
    status: decodeStatus(component),
    description: textValue(component, 'description'),
    priority: decodePriority(component),
    start: dateValue(component, 'dtstart'),
    due: kind === 'VEVENT' ? inclusiveEnd(component) : dateValue(component, 'due'),
    assignee: extensionValue(component, 'x-taskdav-assignee'),
    tags: decodeTags(component),
    createdAt: dateValue(component, 'created'),
    modifiedAt: dateValue(component, 'last-modified'),
  }
}
