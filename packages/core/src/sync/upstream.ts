/**
 * Upstream Client contract
 *
 * The only way the sync engine reaches the project system. Implementations
 * validate what they return; the engine trusts the types.
 *
 * Failures are reported as:
 * - `UpstreamUnavailableError`: network error, timeout, 5xx
 * - `AuthFailureError`: credentials rejected
 * - `NotFoundError`: project vanished between list and fetch
 * - `MalformedUpstreamDataError`: unusable payload
 */

import type { Project, Task } from '../domain/types.js'

export interface UpstreamClient {
  listProjects(signal: AbortSignal): Promise<Project[]>
  listTasks(projectId: string, signal: AbortSignal): Promise<Task[]>
}
