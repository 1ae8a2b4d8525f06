/**
 * HTTP Upstream Client
 *
 * Reads projects and tasks from the project system's REST API:
 *
 *   GET {baseUrl}/projects
 *   GET {baseUrl}/projects/{projectId}/tasks
 *
 * Either endpoint may answer with a bare array or a `{ data: [...] }`
 * envelope. Records are validated before they leave this module.
 */

import {
  AuthFailureError,
  MalformedUpstreamDataError,
  NotFoundError,
  UpstreamUnavailableError,
  describeError,
} from '../errors.js'
import { parseProjectRecords, parseTaskRecords } from '../domain/records.js'
import type { Project, Task } from '../domain/types.js'
import { silentLogger, type Logger } from '../logger.js'
import type { UpstreamClient } from './upstream.js'

export interface HttpUpstreamOptions {
  baseUrl: string
  /** Bearer token; no Authorization header when empty */
  token?: string
  fetch?: typeof fetch
  logger?: Logger
}

export class HttpUpstreamClient implements UpstreamClient {
  private baseUrl: string
  private token: string
  private fetchImpl: typeof fetch
  private log: Logger

  constructor(options: HttpUpstreamOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.token = options.token ?? ''
    this.fetchImpl = options.fetch ?? fetch
    this.log = (options.logger ?? silentLogger()).child({ module: 'upstream' })
  }

  async listProjects(signal: AbortSignal): Promise<Project[]> {
    const body = await this.getJson('/projects', signal)
    return parseProjectRecords(unwrap(body))
  }

  async listTasks(projectId: string, signal: AbortSignal): Promise<Task[]> {
    const body = await this.getJson(`/projects/${encodeURIComponent(projectId)}/tasks`, signal)
    return parseTaskRecords(projectId, unwrap(body))
  }

  // ─────────────────────────────────────────────────────────────

  private async getJson(path: string, signal: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}${path}`
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    let response: Response
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers, signal })
    } catch (err) {
      const reason = isTimeout(err) ? 'timed out' : describeError(err)
      throw new UpstreamUnavailableError(`GET ${path} failed: ${reason}`, { cause: err })
    }

    this.log.debug({ path, status: response.status }, 'upstream response')

    if (response.status === 401 || response.status === 403) {
      throw new AuthFailureError(`GET ${path} rejected with HTTP ${response.status}`)
    }
    if (response.status === 404) {
      throw new NotFoundError(`GET ${path} returned HTTP 404`)
    }
    if (!response.ok) {
      throw new UpstreamUnavailableError(`GET ${path} returned HTTP ${response.status}`)
    }

    let text: string
    try {
      text = await response.text()
    } catch (err) {
      throw new UpstreamUnavailableError(`GET ${path} body read failed: ${describeError(err)}`, {
        cause: err,
      })
    }

    try {
      return JSON.parse(text)
    } catch (err) {
      throw new MalformedUpstreamDataError(`GET ${path} returned invalid JSON`, { cause: err })
    }
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError'
}

function unwrap(body: unknown): unknown {
  if (typeof body === 'object' && body !== null && !Array.isArray(body) && 'data' in body) {
    return body.data
  }
  return body
}
