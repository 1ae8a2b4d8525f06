/**
 * Upstream Record Validation
 *
 * Turns raw JSON from the upstream REST service into Project/Task values.
 * Field aliases and status codes of the source project system are accepted
 * here so nothing downstream has to know about them.
 */

import { z } from 'zod'
import { DateTime } from 'luxon'
import { MalformedUpstreamDataError } from '../errors.js'
import { isDateOnly, isTaskPriority, type Project, type Task, type TaskPriority, type TaskStatus } from './types.js'

const STATUS_ALIASES: Record<string, TaskStatus> = {
  open: 'open',
  ready: 'open',
  todo: 'open',
  '0': 'open',
  'in-progress': 'in-progress',
  doing: 'in-progress',
  '2': 'in-progress',
  done: 'done',
  finished: 'done',
  completed: 'done',
  '1': 'done',
  closed: 'closed',
  cancelled: 'closed',
  '3': 'closed',
}

// The source system spells "high" as "hight"
const PRIORITY_ALIASES: Record<string, TaskPriority> = {
  hight: 'high',
  'very-hight': 'very-high',
}

/**
 * Normalize an upstream date: Unix seconds (number or digit string),
 * `YYYY-MM-DD`, or any ISO-8601 string. Instants come back as UTC
 * `toISOString()` form. Returns null when unparseable.
 */
export function normalizeDate(value: string | number): string | null {
  if (typeof value === 'number' || /^\d+$/.test(value)) {
    const dt = DateTime.fromSeconds(Number(value), { zone: 'utc' }).startOf('second')
    return dt.isValid ? dt.toISO() : null
  }

  if (isDateOnly(value)) {
    return DateTime.fromISO(value).isValid ? value : null
  }

  const dt = DateTime.fromISO(value, { setZone: true })
  // iCalendar DATE-TIME has second precision
  return dt.isValid ? dt.toUTC().startOf('second').toISO() : null
}

export function normalizeStatus(value: string | number | null | undefined): TaskStatus {
  if (value === null || value === undefined) return 'open'
  return STATUS_ALIASES[String(value).trim().toLowerCase()] ?? 'open'
}

export function normalizePriority(value: string | null | undefined): TaskPriority | undefined {
  if (!value) return undefined
  const key = value.trim().toLowerCase()
  if (isTaskPriority(key)) return key
  return PRIORITY_ALIASES[key]
}

// ─── Schemas ───

// Ids end up in hrefs and UID lines; control characters would break both
const idSchema = z
  .union([
    z.string().min(1).regex(/^\P{Cc}*$/u, 'must not contain control characters'),
    z.number().int(),
  ])
  .transform(String)

const textSchema = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined))

// 0 / "0" / "" mean "unset" in the source system
const dateSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined || value === '' || value === 0 || value === '0') {
      return undefined
    }
    const normalized = normalizeDate(value)
    if (normalized === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${value}"` })
      return z.NEVER
    }
    return normalized
  })

const projectRecordSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  description: textSchema,
  desc: textSchema,
  owner: textSchema,
  createdAt: dateSchema,
  modifiedAt: dateSchema,
})

const taskRecordSchema = z
  .object({
    id: idSchema,
    projectId: idSchema.optional(),
    title: textSchema,
    name: textSchema,
    status: z.union([z.string(), z.number()]).nullish(),
    description: textSchema,
    desc: textSchema,
    priority: textSchema,
    start: dateSchema,
    due: dateSchema,
    assignee: textSchema,
    tags: z.array(z.string()).optional(),
    createdAt: dateSchema,
    modifiedAt: dateSchema,
    /** Kanban group header, not a real task */
    isGroup: z.boolean().optional(),
  })
  .refine((record) => Boolean(record.title ?? record.name), {
    message: 'title is required',
    path: ['title'],
  })

export type ProjectRecord = z.input<typeof projectRecordSchema>
export type TaskRecord = z.input<typeof taskRecordSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Validate the project list. Any invalid record fails the whole list,
 * since there is no partial project list to fall back to.
 */
export function parseProjectRecords(raw: unknown): Project[] {
  const result = z.array(projectRecordSchema).safeParse(raw)
  if (!result.success) {
    throw new MalformedUpstreamDataError(`Invalid project list: ${formatIssues(result.error)}`)
  }

  return result.data.map((record) => ({
    id: record.id,
    name: record.name,
    description: record.description ?? record.desc,
    owner: record.owner,
    createdAt: record.createdAt,
    modifiedAt: record.modifiedAt,
  }))
}

/**
 * Validate the task list of one project. Records without an explicit
 * projectId inherit the project being fetched.
 */
export function parseTaskRecords(projectId: string, raw: unknown): Task[] {
  const result = z.array(taskRecordSchema).safeParse(raw)
  if (!result.success) {
    throw new MalformedUpstreamDataError(
      `Invalid task list for project ${projectId}: ${formatIssues(result.error)}`,
    )
  }

  return result.data
    .filter((record) => !record.isGroup)
    .map((record) => ({
      id: record.id,
      projectId: record.projectId ?? projectId,
      title: record.title ?? record.name ?? '',
      status: normalizeStatus(record.status),
      description: record.description ?? record.desc,
      priority: normalizePriority(record.priority),
      start: record.start,
      due: record.due,
      assignee: record.assignee,
      tags: record.tags ?? [],
      createdAt: record.createdAt,
      modifiedAt: record.modifiedAt,
    }))
}

/**
 * Set-level invariants a per-record schema cannot see: every task belongs
 * to the project it was fetched for, and task ids are unique within it.
 */
export function assertTaskSet(projectId: string, tasks: readonly Task[]): void {
  const seen = new Set<string>()
  for (const task of tasks) {
    if (task.projectId !== projectId) {
      throw new MalformedUpstreamDataError(
        `Task ${task.id} reports project ${task.projectId} but was listed under ${projectId}`,
      )
    }
    if (seen.has(task.id)) {
      throw new MalformedUpstreamDataError(`Duplicate task id ${task.id} in project ${projectId}`)
    }
    seen.add(task.id)
  }
}

/** Same check for project ids across the project list */
export function assertProjectSet(projects: readonly Project[]): void {
  const seen = new Set<string>()
  for (const project of projects) {
    if (seen.has(project.id)) {
      throw new MalformedUpstreamDataError(`Duplicate project id ${project.id}`)
    }
    seen.add(project.id)
  }
}
