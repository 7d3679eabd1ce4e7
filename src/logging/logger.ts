import path from 'node:path'

import { Logger } from 'tslog'

import type { LoggingFormat, LoggingLevel, SlidescribeConfig } from '../config.js'
import { resolveConfigDir } from '../config.js'

import { createRingFileWriter } from './ring-file.js'

export type AppLogger = Logger<Record<string, unknown>>

export type ResolvedLogging = {
  level: LoggingLevel
  format: LoggingFormat
  file: string
  maxBytes: number
  maxFiles: number
}

export type AppLogging = {
  logger: AppLogger
  config: ResolvedLogging | null
  flush: () => Promise<void>
}

const DEFAULT_LOG_LEVEL: LoggingLevel = 'info'
const DEFAULT_LOG_FORMAT: LoggingFormat = 'json'
const DEFAULT_LOG_MAX_MB = 10
const DEFAULT_LOG_MAX_FILES = 3

const LOG_LEVEL_MAP: Record<LoggingLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

function formatPrettyLine(metaMarkup: string, args: unknown[], errors: string[]): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' '))
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  return base ? `${base}\n${errors.join('\n')}` : errors.join('\n')
}

export function resolveLogging({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: SlidescribeConfig | null
}): ResolvedLogging | null {
  const logging = config?.logging
  if (!logging || logging.enabled !== true) return null

  const configDir = resolveConfigDir(env)
  const file = logging.file
    ? logging.file
    : configDir
      ? path.join(configDir, 'logs', 'slidescribe.jsonl')
      : null
  if (!file) return null

  return {
    level: logging.level ?? DEFAULT_LOG_LEVEL,
    format: logging.format ?? DEFAULT_LOG_FORMAT,
    file,
    maxBytes: Math.trunc((logging.maxMb ?? DEFAULT_LOG_MAX_MB) * 1024 * 1024),
    maxFiles: logging.maxFiles ?? DEFAULT_LOG_MAX_FILES,
  }
}

/** A logger that drops everything; used when file logging is off and in tests. */
export function createSilentLogger(name = 'slidescribe'): AppLogger {
  return new Logger<Record<string, unknown>>({ name, type: 'hidden' })
}

export function createAppLogging({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: SlidescribeConfig | null
}): AppLogging {
  const resolved = resolveLogging({ env, config })
  if (!resolved) {
    return { logger: createSilentLogger(), config: null, flush: async () => {} }
  }

  const writer = createRingFileWriter({
    filePath: resolved.file,
    maxBytes: resolved.maxBytes,
    maxFiles: resolved.maxFiles,
  })

  const baseSettings = {
    name: 'slidescribe',
    minLevel: LOG_LEVEL_MAP[resolved.level],
    hideLogPositionForProduction: true,
    metaProperty: '_meta',
  }

  const logger =
    resolved.format === 'pretty'
      ? new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'pretty',
          overwrite: {
            transportFormatted: (metaMarkup, args, errors) => {
              writer.write(formatPrettyLine(metaMarkup, args, errors))
            },
          },
        })
      : new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'json',
          overwrite: {
            transportJSON: (json) => {
              writer.write(safeJsonStringify(json))
            },
          },
        })

  return { logger, config: resolved, flush: writer.flush }
}
