import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import path from 'node:path'

export type FailureTool = 'primary-transcoder' | 'fallback-decoder' | 'transcriber'

export type FailureDetails = {
  logPath: string | null
  [key: string]: unknown
}

export type FailureInput = {
  videoId: string | null
  slideId: string | null
  startFrame: number | null
  endFrame: number | null
  attempts: number
  tool: FailureTool
  error: string
  details: FailureDetails | null
}

export type FailureRecord = FailureInput & {
  id: string
  createdAt: string
}

export type FailureRecorder = {
  recordFailure: (failure: FailureInput) => Promise<FailureRecord>
}

export const TRANSCODER_STDERR_LIMIT = 2000
export const TRANSCRIBER_STDERR_LIMIT = 4000

export function truncateDiagnostic(text: string, limit: number, suffix: string): string {
  if (text.length <= limit) return text
  return `${text.slice(0, limit)}${suffix}`
}

const pad = (value: number) => value.toString().padStart(2, '0')

function utcStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  )
}

const sanitizeSegment = (value: string) => value.replace(/[^A-Za-z0-9._-]+/g, '-').slice(0, 64)

/**
 * Write the untruncated diagnostics next to other failure logs and return the file path.
 * The directory carries a `.gitignore` so logs never end up in a checkout.
 */
export async function writeFailureLog({
  logsDir,
  text,
  videoId,
  prefix,
  now = new Date(),
}: {
  logsDir: string
  text: string
  videoId: string | null
  prefix: string
  now?: Date
}): Promise<string> {
  await fs.mkdir(logsDir, { recursive: true })
  const ignorePath = path.join(logsDir, '.gitignore')
  await fs.writeFile(ignorePath, '*\n', { flag: 'wx' }).catch((error: unknown) => {
    const code = error && typeof error === 'object' && 'code' in error ? String(error.code) : ''
    if (code !== 'EEXIST') throw error
  })
  const name = [
    sanitizeSegment(videoId ?? 'novid'),
    sanitizeSegment(prefix),
    utcStamp(now),
    randomUUID().replace(/-/g, '').slice(0, 8),
  ].join('_')
  const filePath = path.join(logsDir, `${name}.stderr.log`)
  await fs.writeFile(filePath, text, 'utf8')
  return filePath
}
