// Public API for consumption by other packages (server)

// Domain
export type { Project, Task, TaskDate, TaskPriority, TaskStatus } from './domain/types.js'
export { TASK_PRIORITIES, TASK_STATUSES, isDateOnly } from './domain/types.js'
export {
  parseProjectRecords,
  parseTaskRecords,
  normalizeDate,
  normalizeStatus,
  normalizePriority,
} from './domain/records.js'
export type { ProjectRecord, TaskRecord } from './domain/records.js'

// Errors
export {
  TaskdavError,
  UpstreamUnavailableError,
  AuthFailureError,
  MalformedUpstreamDataError,
  ProtocolRequestError,
  NotFoundError,
  StaleTokenError,
  ConfigError,
  describeError,
} from './errors.js'
export type { TaskdavErrorCode } from './errors.js'

// iCalendar
export {
  PRODID,
  taskUid,
  componentKind,
  encodeTask,
  encodeCalendar,
  encodeCombined,
  decodeTask,
} from './ical/codec.js'
export type { CodecOptions, ComponentKind, DecodedTask, ProjectTasks } from './ical/codec.js'
export { htmlToText } from './ical/html.js'

// Cache
export { CacheStore, DEFAULT_HISTORY_LIMIT } from './cache/store.js'
export type { CacheStoreOptions, ChangeSet, PublishSummary } from './cache/store.js'
export { computeCtag, computeEtag, emptySnapshot } from './cache/snapshot.js'
export type {
  CalendarEntry,
  ChangeRecord,
  DraftCalendar,
  EventEntry,
  Snapshot,
  SnapshotDraft,
} from './cache/snapshot.js'

// Resource tree
export { resolve, children, hrefOf, isCollection } from './tree/resource-tree.js'
export type { ResourceNode, ResourceKind, TreeOptions } from './tree/resource-tree.js'
export { calendarHref, eventHref, calendarFileHref, principalHref } from './tree/paths.js'

// Sync
export { SyncEngine } from './sync/engine.js'
export type {
  CycleOutcome,
  CycleResult,
  EngineState,
  EngineStatus,
  ProjectFailure,
  SyncEngineOptions,
} from './sync/engine.js'
export { computeBackoff, DEFAULT_BACKOFF } from './sync/backoff.js'
export type { BackoffPolicy } from './sync/backoff.js'
export type { UpstreamClient } from './sync/upstream.js'
export { HttpUpstreamClient } from './sync/http-upstream.js'
export type { HttpUpstreamOptions } from './sync/http-upstream.js'

// CalDAV
export { CalDAVHandler } from './caldav/handler.js'
export type { CalDAVHandlerOptions, DavRequest, DavResponse } from './caldav/handler.js'

// Config & logging
export { loadConfig, resolveConfigPath, applyEnvOverrides } from './config.js'
export type { LoadConfigOptions, TaskdavConfig } from './config.js'
export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'
