import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { IANAZone } from 'luxon'
import { ConfigError } from './errors.js'
import { DEFAULT_BACKOFF } from './sync/backoff.js'
import { DEFAULT_HISTORY_LIMIT } from './cache/store.js'

const CONFIG_FILENAME = 'config.yaml'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

// ─── Schema ───

const backoffSchema = z.object({
  initialMs: z.number().int().positive().default(DEFAULT_BACKOFF.initialMs),
  maxMs: z.number().int().positive().default(DEFAULT_BACKOFF.maxMs),
  factor: z.number().min(1).default(DEFAULT_BACKOFF.factor),
  jitter: z.number().min(0).max(1).default(DEFAULT_BACKOFF.jitter),
  maxAttempts: z.number().int().min(0).default(DEFAULT_BACKOFF.maxAttempts),
})

const configSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(5082),
    })
    .default({}),
  upstream: z.object({
    baseUrl: z.string().url(),
    token: z.string().default(''),
    timeoutMs: z.number().int().positive().default(30_000),
  }),
  sync: z
    .object({
      intervalMs: z.number().int().positive().default(300_000),
      syncOnStart: z.boolean().default(true),
      historyLimit: z.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
      backoff: backoffSchema.default({}),
    })
    .default({}),
  caldav: z.object({
    username: z.string().min(1).default('taskdav'),
    password: z.string().min(1),
    realm: z.string().min(1).default('taskdav'),
    publicTokens: z.array(z.string().min(1)).default([]),
  }),
  ical: z
    .object({
      timezone: z
        .string()
        .default('UTC')
        .refine((zone) => IANAZone.isValidZone(zone), { message: 'unknown time zone' }),
      alarms: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      pretty: z.boolean().default(false),
    })
    .default({}),
})

export type TaskdavConfig = z.output<typeof configSchema>

// ─── Environment overrides ───

type EnvKind = 'string' | 'number' | 'boolean' | 'list'

interface EnvBinding {
  env: string
  path: [string, ...string[]]
  kind: EnvKind
}

const ENV_BINDINGS: EnvBinding[] = [
  { env: 'SERVER_HOST', path: ['server', 'host'], kind: 'string' },
  { env: 'SERVER_PORT', path: ['server', 'port'], kind: 'number' },
  { env: 'UPSTREAM_BASE_URL', path: ['upstream', 'baseUrl'], kind: 'string' },
  { env: 'UPSTREAM_TOKEN', path: ['upstream', 'token'], kind: 'string' },
  { env: 'UPSTREAM_TIMEOUT_MS', path: ['upstream', 'timeoutMs'], kind: 'number' },
  { env: 'SYNC_INTERVAL_MS', path: ['sync', 'intervalMs'], kind: 'number' },
  { env: 'SYNC_ON_START', path: ['sync', 'syncOnStart'], kind: 'boolean' },
  { env: 'SYNC_BACKOFF_INITIAL_MS', path: ['sync', 'backoff', 'initialMs'], kind: 'number' },
  { env: 'SYNC_BACKOFF_MAX_MS', path: ['sync', 'backoff', 'maxMs'], kind: 'number' },
  { env: 'SYNC_BACKOFF_FACTOR', path: ['sync', 'backoff', 'factor'], kind: 'number' },
  { env: 'SYNC_BACKOFF_JITTER', path: ['sync', 'backoff', 'jitter'], kind: 'number' },
  { env: 'SYNC_BACKOFF_MAX_ATTEMPTS', path: ['sync', 'backoff', 'maxAttempts'], kind: 'number' },
  { env: 'CALDAV_USERNAME', path: ['caldav', 'username'], kind: 'string' },
  { env: 'CALDAV_PASSWORD', path: ['caldav', 'password'], kind: 'string' },
  { env: 'CALDAV_REALM', path: ['caldav', 'realm'], kind: 'string' },
  { env: 'CALDAV_PUBLIC_TOKENS', path: ['caldav', 'publicTokens'], kind: 'list' },
  { env: 'ICAL_TIMEZONE', path: ['ical', 'timezone'], kind: 'string' },
  { env: 'ICAL_ALARMS', path: ['ical', 'alarms'], kind: 'boolean' },
  { env: 'LOG_LEVEL', path: ['logging', 'level'], kind: 'string' },
  { env: 'LOG_PRETTY', path: ['logging', 'pretty'], kind: 'boolean' },
]

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off'])

/**
 * Convert an env string to the binding's type. Unconvertible values are
 * passed through unchanged so schema validation reports them with their key.
 */
function coerce(value: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'string':
      return value
    case 'number': {
      const parsed = Number(value)
      return value.trim() !== '' && Number.isFinite(parsed) ? parsed : value
    }
    case 'boolean': {
      const lower = value.trim().toLowerCase()
      if (TRUE_VALUES.has(lower)) return true
      if (FALSE_VALUES.has(lower)) return false
      return value
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '')
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function setPath(target: Record<string, unknown>, keys: [string, ...string[]], value: unknown): void {
  const [head, ...rest] = keys
  if (rest.length === 0) {
    target[head] = value
    return
  }
  const existing = target[head]
  const child: Record<string, unknown> = isRecord(existing) ? { ...existing } : {}
  target[head] = child
  setPath(child, [rest[0], ...rest.slice(1)], value)
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw }
  for (const binding of ENV_BINDINGS) {
    const value = env[binding.env]
    if (value === undefined) continue
    if (value === '' && binding.kind !== 'string') continue
    setPath(merged, binding.path, coerce(value, binding.kind))
  }
  return merged
}

// ─── Loading ───

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  path?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

/**
 * Locate the config file: explicit path, then $TASKDAV_CONFIG, then
 * ./config.yaml and ./config/config.yaml. Returns null when none exists.
 */
export function resolveConfigPath(options: LoadConfigOptions = {}): string | null {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()

  const explicit = options.path ?? env.TASKDAV_CONFIG
  if (explicit) {
    const resolved = path.resolve(cwd, explicit)
    if (!existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`)
    }
    return resolved
  }

  for (const candidate of [CONFIG_FILENAME, path.join('config', CONFIG_FILENAME)]) {
    const resolved = path.join(cwd, candidate)
    if (existsSync(resolved)) return resolved
  }
  return null
}

function readYaml(configPath: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    )
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a YAML mapping`)
  }
  return parsed
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
}

/**
 * Load configuration: defaults, overridden by the YAML file, overridden by
 * environment variables.
 *
 * @throws ConfigError on unreadable YAML or values failing validation
 */
export function loadConfig(options: LoadConfigOptions = {}): TaskdavConfig {
  const env = options.env ?? process.env
  const configPath = resolveConfigPath(options)
  const raw = configPath ? readYaml(configPath) : {}

  const result = configSchema.safeParse(applyEnvOverrides(raw, env))
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`)
  }
  return result.data
}
