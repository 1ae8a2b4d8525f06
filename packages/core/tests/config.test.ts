import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { applyEnvOverrides, loadConfig, resolveConfigPath } from '../src/config.js'
import { ConfigError } from '../src/errors.js'
import { DEFAULT_BACKOFF } from '../src/sync/backoff.js'

const MINIMAL_YAML = `upstream:
  baseUrl: https://upstream.test/api
caldav:
  password: test-secret
`

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function writeFile(dir: string, relativePath: string, content: string): string {
  const fullPath = path.join(dir, relativePath)
  fs.mkdirSync(path.dirname(fullPath), { recursive: true })
  fs.writeFileSync(fullPath, content, 'utf-8')
  return fullPath
}

describe('loadConfig', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskdav-config-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('fills defaults around the required values', () => {
    writeFile(tempDir, 'config.yaml', MINIMAL_YAML)

    const config = loadConfig({ cwd: tempDir, env: {} })

    expect(config.server).toEqual({ host: '0.0.0.0', port: 5082 })
    expect(config.upstream).toEqual({ baseUrl: 'https://upstream.test/api', token: '', timeoutMs: 30000 })
    expect(config.sync).toEqual({
      intervalMs: 300000,
      syncOnStart: true,
      historyLimit: 100,
      backoff: DEFAULT_BACKOFF,
    })
    expect(config.caldav).toEqual({
      username: 'taskdav',
      password: 'test-secret',
      realm: 'taskdav',
      publicTokens: [],
    })
    expect(config.ical).toEqual({ timezone: 'UTC', alarms: true })
    expect(config.logging).toEqual({ level: 'info', pretty: false })
  })

  it('lets environment variables override the file', () => {
    writeFile(tempDir, 'config/config.yaml', `${MINIMAL_YAML}server:\n  port: 6000\n`)

    const config = loadConfig({
      cwd: tempDir,
      env: {
        SERVER_PORT: '8080',
        SYNC_ON_START: 'no',
        CALDAV_PUBLIC_TOKENS: 'feed-a, feed-b,,',
        ICAL_TIMEZONE: 'Europe/Berlin',
        SYNC_BACKOFF_MAX_ATTEMPTS: '1',
      },
    })

    expect(config.server.port).toBe(8080)
    expect(config.sync.syncOnStart).toBe(false)
    expect(config.sync.backoff.maxAttempts).toBe(1)
    expect(config.caldav.publicTokens).toEqual(['feed-a', 'feed-b'])
    expect(config.ical.timezone).toBe('Europe/Berlin')
  })

  it('works from the environment alone', () => {
    const config = loadConfig({
      cwd: tempDir,
      env: { UPSTREAM_BASE_URL: 'https://upstream.test', CALDAV_PASSWORD: 'test-secret' },
    })
    expect(config.upstream.baseUrl).toBe('https://upstream.test')
  })

  it('reports every invalid value with its key', () => {
    writeFile(tempDir, 'config.yaml', MINIMAL_YAML)
    const load = () => loadConfig({ cwd: tempDir, env: { SERVER_PORT: 'eighty', ICAL_TIMEZONE: 'Mars/Olympus' } })

    expect(load).toThrow(ConfigError)
    expect(load).toThrow(/server\.port: Expected number, received string/)
    expect(load).toThrow(/ical\.timezone: unknown time zone/)
  })

  it('requires the upstream URL and the CalDAV password', () => {
    expect(() => loadConfig({ cwd: tempDir, env: {} })).toThrow(/upstream: Required/)
  })

  it('rejects YAML that is not a mapping', () => {
    writeFile(tempDir, 'config.yaml', '- just\n- a list\n')
    expect(() => loadConfig({ cwd: tempDir, env: {} })).toThrow('must contain a YAML mapping')
  })

  it('rejects unparseable YAML', () => {
    writeFile(tempDir, 'config.yaml', 'upstream: [unclosed\n')
    expect(() => loadConfig({ cwd: tempDir, env: {} })).toThrow(/Could not parse/)
  })
})

describe('resolveConfigPath', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskdav-config-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('prefers TASKDAV_CONFIG over the working directory', () => {
    writeFile(tempDir, 'config.yaml', MINIMAL_YAML)
    const custom = writeFile(tempDir, 'etc/taskdav.yaml', MINIMAL_YAML)

    expect(resolveConfigPath({ cwd: tempDir, env: { TASKDAV_CONFIG: 'etc/taskdav.yaml' } })).toBe(custom)
  })

  it('fails when an explicit file is missing', () => {
    expect(() => resolveConfigPath({ cwd: tempDir, env: {}, path: 'missing.yaml' })).toThrow(ConfigError)
  })

  it('returns null when no file exists', () => {
    expect(resolveConfigPath({ cwd: tempDir, env: {} })).toBeNull()
  })
})

describe('applyEnvOverrides', () => {
  it('ignores empty values for typed settings', () => {
    expect(applyEnvOverrides({ server: { port: 1 } }, { SERVER_PORT: '' })).toEqual({ server: { port: 1 } })
  })

  it('does not modify the input', () => {
    const raw = { server: { port: 1 } }
    applyEnvOverrides(raw, { SERVER_PORT: '2' })
    expect(raw).toEqual({ server: { port: 1 } })
  })
})
