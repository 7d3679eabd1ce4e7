import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

import { resolveProcessingSettings } from './processing/settings.js'

export type LoggingLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggingFormat = 'json' | 'pretty'
export type LoggingConfig = {
  enabled?: boolean
  level?: LoggingLevel
  format?: LoggingFormat
  file?: string
  maxMb?: number
  maxFiles?: number
}

export type PathsConfig = {
  /** Root for per-video slide images and document.json (default: ./slidescribe-output). */
  output?: string
  /** Root for per-video WAV working areas (default: ~/.slidescribe/audio). */
  audio?: string
  /** Where full stderr logs of failed tool runs go (default: ~/.slidescribe/logs/audio_failures). */
  failureLogs?: string
}

export type ToolsConfig = {
  ffmpeg?: string
  ffprobe?: string
  whisperCpp?: string
  /** Directory holding ggml-<size>.bin whisper.cpp models. */
  whisperModelDir?: string
}

export type JobsConfig = {
  throttleMs?: number
  minPercentDelta?: number
  maxLogEntries?: number
  /** Live extract preview cap, 10-50. */
  maxExtracts?: number
  retentionMinutes?: number
}

export type DaemonConfig = {
  port?: number
  token?: string
}

export type SlidescribeConfig = {
  /**
   * Default processing settings; request settings win field by field.
   *
   * Same keys as the `process` CLI flags in camelCase (e.g. `thresholdSsim`, `frameGap`).
   */
  processing?: Record<string, unknown>
  paths?: PathsConfig
  tools?: ToolsConfig
  jobs?: JobsConfig
  daemon?: DaemonConfig
  logging?: LoggingConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function resolveConfigDir(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  return home ? join(home, '.slidescribe') : null
}

function parseLoggingLevel(raw: unknown, path: string): LoggingLevel {
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "logging.level" must be a string.`)
  }
  const trimmed = raw.trim().toLowerCase()
  if (trimmed === 'debug' || trimmed === 'info' || trimmed === 'warn' || trimmed === 'error') {
    return trimmed
  }
  throw new Error(
    `Invalid config file ${path}: "logging.level" must be one of "debug", "info", "warn", "error".`
  )
}

function parseLoggingFormat(raw: unknown, path: string): LoggingFormat {
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "logging.format" must be a string.`)
  }
  const trimmed = raw.trim().toLowerCase()
  if (trimmed === 'json' || trimmed === 'pretty') {
    return trimmed
  }
  throw new Error(`Invalid config file ${path}: "logging.format" must be one of "json" or "pretty".`)
}

function readSection(
  parsed: Record<string, unknown>,
  key: string,
  path: string
): Record<string, unknown> | undefined {
  const value = parsed[key]
  if (typeof value === 'undefined') return undefined
  if (!isRecord(value)) {
    throw new Error(`Invalid config file ${path}: "${key}" must be an object.`)
  }
  return value
}

function readString(
  section: Record<string, unknown>,
  key: string,
  label: string,
  path: string
): string | undefined {
  const value = section[key]
  if (typeof value === 'undefined') return undefined
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a non-empty string.`)
  }
  return value.trim()
}

function readNumber(
  section: Record<string, unknown>,
  key: string,
  label: string,
  path: string,
  { min, max, integer = false }: { min: number; max?: number; integer?: boolean }
): number | undefined {
  const value = section[key]
  if (typeof value === 'undefined') return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a number.`)
  }
  if (integer && !Number.isInteger(value)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an integer.`)
  }
  if (value < min || (typeof max === 'number' && value > max)) {
    const range = typeof max === 'number' ? `between ${min} and ${max}` : `>= ${min}`
    throw new Error(`Invalid config file ${path}: "${label}" must be ${range}.`)
  }
  return value
}

const compact = <T extends Record<string, unknown>>(value: T): T | undefined =>
  Object.values(value).some((entry) => typeof entry !== 'undefined') ? value : undefined

export function parseSlidescribeConfig(raw: string, path: string): SlidescribeConfig {
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const processing = (() => {
    const value = readSection(parsed, 'processing', path)
    if (!value) return undefined
    try {
      resolveProcessingSettings(value)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new Error(`Invalid config file ${path}: "processing": ${message}`)
    }
    return value
  })()

  const paths = (() => {
    const value = readSection(parsed, 'paths', path)
    if (!value) return undefined
    return compact<PathsConfig>({
      output: readString(value, 'output', 'paths.output', path),
      audio: readString(value, 'audio', 'paths.audio', path),
      failureLogs: readString(value, 'failureLogs', 'paths.failureLogs', path),
    })
  })()

  const tools = (() => {
    const value = readSection(parsed, 'tools', path)
    if (!value) return undefined
    return compact<ToolsConfig>({
      ffmpeg: readString(value, 'ffmpeg', 'tools.ffmpeg', path),
      ffprobe: readString(value, 'ffprobe', 'tools.ffprobe', path),
      whisperCpp: readString(value, 'whisperCpp', 'tools.whisperCpp', path),
      whisperModelDir: readString(value, 'whisperModelDir', 'tools.whisperModelDir', path),
    })
  })()

  const jobs = (() => {
    const value = readSection(parsed, 'jobs', path)
    if (!value) return undefined
    return compact<JobsConfig>({
      throttleMs: readNumber(value, 'throttleMs', 'jobs.throttleMs', path, { min: 0 }),
      minPercentDelta: readNumber(value, 'minPercentDelta', 'jobs.minPercentDelta', path, {
        min: 0,
        max: 100,
      }),
      maxLogEntries: readNumber(value, 'maxLogEntries', 'jobs.maxLogEntries', path, {
        min: 1,
        integer: true,
      }),
      maxExtracts: readNumber(value, 'maxExtracts', 'jobs.maxExtracts', path, {
        min: 10,
        max: 50,
        integer: true,
      }),
      retentionMinutes: readNumber(value, 'retentionMinutes', 'jobs.retentionMinutes', path, {
        min: 0,
      }),
    })
  })()

  const daemon = (() => {
    const value = readSection(parsed, 'daemon', path)
    if (!value) return undefined
    return compact<DaemonConfig>({
      port: readNumber(value, 'port', 'daemon.port', path, { min: 1, max: 65535, integer: true }),
      token: readString(value, 'token', 'daemon.token', path),
    })
  })()

  const logging = (() => {
    const value = readSection(parsed, 'logging', path)
    if (!value) return undefined
    const enabled = typeof value.enabled === 'boolean' ? value.enabled : undefined
    const level = typeof value.level === 'undefined' ? undefined : parseLoggingLevel(value.level, path)
    const format =
      typeof value.format === 'undefined' ? undefined : parseLoggingFormat(value.format, path)
    return compact<LoggingConfig>({
      enabled,
      level,
      format,
      file: readString(value, 'file', 'logging.file', path),
      maxMb: readNumber(value, 'maxMb', 'logging.maxMb', path, { min: 0.01 }),
      maxFiles: readNumber(value, 'maxFiles', 'logging.maxFiles', path, { min: 1, integer: true }),
    })
  })()

  return {
    ...(processing ? { processing } : {}),
    ...(paths ? { paths } : {}),
    ...(tools ? { tools } : {}),
    ...(jobs ? { jobs } : {}),
    ...(daemon ? { daemon } : {}),
    ...(logging ? { logging } : {}),
  }
}

export function loadSlidescribeConfig({ env }: { env: Record<string, string | undefined> }): {
  config: SlidescribeConfig | null
  path: string | null
} {
  const dir = resolveConfigDir(env)
  if (!dir) return { config: null, path: null }
  const path = join(dir, 'config.json')

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  return { config: parseSlidescribeConfig(raw, path), path }
}
