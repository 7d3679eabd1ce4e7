import fs from 'node:fs/promises'
import path from 'node:path'

export type RingFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
  /** Called when an append fails; the line is dropped either way. */
  onError?: (error: unknown) => void
}

export type RingFileWriter = {
  write: (line: string) => void
  flush: () => Promise<void>
}

const normalizeMaxFiles = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1

const normalizeMaxBytes = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1024

const isMissing = (error: unknown) =>
  Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT')

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.stat(filePath)).size
  } catch (error) {
    if (isMissing(error)) return 0
    throw error
  }
}

// file -> file.1 -> file.2 ...; the oldest generation falls off the end.
async function rotateFiles(filePath: string, maxFiles: number) {
  if (maxFiles <= 1) {
    await fs.truncate(filePath, 0).catch((error: unknown) => {
      if (!isMissing(error)) throw error
    })
    return
  }
  for (let i = maxFiles - 1; i >= 1; i -= 1) {
    const src = i === 1 ? filePath : `${filePath}.${i - 1}`
    await fs.rename(src, `${filePath}.${i}`).catch((error: unknown) => {
      if (!isMissing(error)) throw error
    })
  }
}

export function createRingFileWriter(options: RingFileOptions): RingFileWriter {
  const { filePath, onError } = options
  const maxBytes = normalizeMaxBytes(options.maxBytes)
  const maxFiles = normalizeMaxFiles(options.maxFiles)
  let ready: Promise<unknown> | null = null
  let chain = Promise.resolve()

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    chain = chain
      .then(async () => {
        ready ??= fs.mkdir(path.dirname(filePath), { recursive: true })
        await ready
        if ((await fileSize(filePath)) + bytes > maxBytes) {
          await rotateFiles(filePath, maxFiles)
        }
        await fs.appendFile(filePath, normalized, 'utf8')
      })
      .catch((error: unknown) => {
        onError?.(error)
      })
  }

  const flush = async () => await chain

  return { write, flush }
}
