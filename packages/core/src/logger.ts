/**
 * Logger factory
 *
 * One pino instance per process. Components take it as a dependency and
 * derive `child({ module })` loggers; the HTTP server reuses the same
 * instance so request logs and sync logs share one stream.
 */

import { pino, type Logger } from 'pino'

export interface LoggerOptions {
  level?: string
  /** Human-readable output via pino-pretty (development) */
  pretty?: boolean
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'taskdav',
    level: options.level ?? 'info',
    redact: ['password', 'token', 'req.headers.authorization'],
    ...(options.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  })
}

/** Logger that discards everything; used as the default in tests and libraries */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export type { Logger }
