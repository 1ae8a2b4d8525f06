/**
 * Domain Types
 *
 * Plain data values exchanged between the upstream client, the sync engine
 * and the cache store. Nothing here has behaviour or identity beyond its
 * fields; a Project/Task only exists inside a published snapshot.
 */

export type TaskStatus = 'open' | 'in-progress' | 'done' | 'closed'

export type TaskPriority = 'very-low' | 'low' | 'normal' | 'high' | 'very-high'

/**
 * Either a calendar date (`2024-06-01`, all-day) or a UTC instant in
 * `Date#toISOString()` form (`2024-06-01T09:30:00.000Z`).
 */
export type TaskDate = string

export interface Project {
  /** Upstream-stable id; also the calendar's URL segment */
  id: string
  name: string
  description?: string
  owner?: string
  createdAt?: string
  modifiedAt?: string
}

export interface Task {
  /** Upstream-stable id, unique within its project */
  id: string
  projectId: string
  title: string
  status: TaskStatus
  /** May contain HTML; converted to text by the codec */
  description?: string
  priority?: TaskPriority
  start?: TaskDate
  due?: TaskDate
  assignee?: string
  tags: string[]
  createdAt?: string
  /** Last-modified timestamp reported by upstream */
  modifiedAt?: string
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

export function isDateOnly(value: TaskDate): boolean {
  return DATE_ONLY.test(value)
}

export const TASK_STATUSES: readonly TaskStatus[] = ['open', 'in-progress', 'done', 'closed']

export const TASK_PRIORITIES: readonly TaskPriority[] = [
  'very-low',
  'low',
  'normal',
  'high',
  'very-high',
]

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value)
}

export function isTaskPriority(value: string): value is TaskPriority {
  return TASK_PRIORITIES.some((priority) => priority === value)
}
