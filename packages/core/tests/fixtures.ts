/**
 * Shared test data and in-process upstream stand-in.
 */

import type { Project, Task } from '../src/domain/types.js'
import type { UpstreamClient } from '../src/sync/upstream.js'

export const PROJECT: Project = { id: 'p1', name: 'Website' }

export const OTHER_PROJECT: Project = { id: 'p2', name: 'Office move' }

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 't1',
    projectId: 'p1',
    title: 'Write copy',
    status: 'open',
    tags: [],
    ...overrides,
  }
}

/** VTODO: due date only */
export const TODO_TASK: Task = makeTask({
  id: 't1',
  title: 'Write copy, draft',
  due: '2024-06-03',
  priority: 'high',
  tags: ['docs'],
  assignee: 'sam',
  createdAt: '2024-05-01T08:00:00.000Z',
  modifiedAt: '2024-05-02T09:30:00.000Z',
})

/** VEVENT: timed start and due */
export const EVENT_TASK: Task = makeTask({
  id: 't2',
  title: 'Review',
  status: 'in-progress',
  start: '2024-06-01T09:00:00.000Z',
  due: '2024-06-01T10:00:00.000Z',
  priority: 'normal',
})

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`
}

type Step<T> = T | Error | ((signal: AbortSignal) => Promise<T>)

/**
 * Scriptable UpstreamClient. Each call consumes the next scripted step for
 * the endpoint, or repeats the last one once the script runs out.
 */
export class FakeUpstream implements UpstreamClient {
  projectCalls = 0
  taskCalls: string[] = []
  private projectSteps: Step<Project[]>[] = []
  private taskSteps = new Map<string, Step<Task[]>[]>()

  projects(...steps: Step<Project[]>[]): this {
    this.projectSteps = steps
    return this
  }

  tasks(projectId: string, ...steps: Step<Task[]>[]): this {
    this.taskSteps.set(projectId, steps)
    return this
  }

  async listProjects(signal: AbortSignal): Promise<Project[]> {
    const step = pick(this.projectSteps, this.projectCalls)
    this.projectCalls++
    return run(step, signal, [])
  }

  async listTasks(projectId: string, signal: AbortSignal): Promise<Task[]> {
    const steps = this.taskSteps.get(projectId) ?? []
    const step = pick(steps, this.taskCalls.filter((id) => id === projectId).length)
    this.taskCalls.push(projectId)
    return run(step, signal, [])
  }
}

function pick<T>(steps: Step<T>[], index: number): Step<T> | undefined {
  return steps[Math.min(index, steps.length - 1)]
}

async function run<T>(step: Step<T> | undefined, signal: AbortSignal, fallback: T): Promise<T> {
  if (step === undefined) return fallback
  if (step instanceof Error) throw step
  if (isCallback(step)) return step(signal)
  return step
}

function isCallback<T>(step: Step<T>): step is (signal: AbortSignal) => Promise<T> {
  return typeof step === 'function'
}

/** A promise plus the function that settles it */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve }
}
