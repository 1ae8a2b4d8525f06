/**
 * Error Taxonomy
 *
 * Every failure the bridge distinguishes has its own class so callers can
 * branch with `instanceof` instead of parsing messages.
 *
 * - Sync engine: UpstreamUnavailable / AuthFailure / MalformedUpstreamData / NotFound
 * - Protocol handler: ProtocolRequest / NotFound / AuthFailure / StaleToken
 * - Startup: Config
 */

export type TaskdavErrorCode =
  | 'UPSTREAM_UNAVAILABLE'
  | 'AUTH_FAILURE'
  | 'MALFORMED_UPSTREAM_DATA'
  | 'PROTOCOL_REQUEST'
  | 'NOT_FOUND'
  | 'STALE_TOKEN'
  | 'CONFIG'

export abstract class TaskdavError extends Error {
  abstract readonly code: TaskdavErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network failure, timeout or 5xx from the upstream REST service */
export class UpstreamUnavailableError extends TaskdavError {
  readonly code = 'UPSTREAM_UNAVAILABLE' as const
}

/** Credentials rejected, either by upstream or by CalDAV Basic auth */
export class AuthFailureError extends TaskdavError {
  readonly code = 'AUTH_FAILURE' as const
}

/** Upstream record missing required fields or otherwise unusable */
export class MalformedUpstreamDataError extends TaskdavError {
  readonly code = 'MALFORMED_UPSTREAM_DATA' as const
}

/**
 * Client request the protocol layer cannot serve: unparseable body,
 * invalid Depth, unsupported report.
 *
 * `precondition` names a DAV:error child element (RFC 4918 §16) that is
 * rendered into the response body, e.g. `propfind-finite-depth`.
 */
export class ProtocolRequestError extends TaskdavError {
  readonly code = 'PROTOCOL_REQUEST' as const
  readonly status: number
  readonly precondition?: string

  constructor(message: string, options?: { status?: number; precondition?: string; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.status = options?.status ?? 400
    this.precondition = options?.precondition
  }
}

export class NotFoundError extends TaskdavError {
  readonly code = 'NOT_FOUND' as const
}

/** sync-collection token is unknown or older than the retained history */
export class StaleTokenError extends TaskdavError {
  readonly code = 'STALE_TOKEN' as const
}

/** Invalid configuration file or environment; fatal at startup */
export class ConfigError extends TaskdavError {
  readonly code = 'CONFIG' as const
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
