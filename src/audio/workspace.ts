import { type Dirent, promises as fs } from 'node:fs'
import path from 'node:path'

export const DEFAULT_MAX_WAV_FILES = 200

const sanitize = (value: string) => value.replace(/[^A-Za-z0-9._-]+/g, '_')

/** Per-video WAV location; concurrent jobs never share a namespace. */
export function segmentWavPath({
  audioRoot,
  videoId,
  videoPath,
  startFrame,
  endFrame,
}: {
  audioRoot: string
  videoId: string | null
  videoPath: string
  startFrame: number
  endFrame: number
}): string {
  const base = sanitize(path.parse(videoPath).name) || 'video'
  return path.join(audioRoot, sanitize(videoId ?? 'novid'), `${base}-${startFrame}-${endFrame}.wav`)
}

export async function isReusableWav(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath)
    return stat.isFile() && stat.size > 44
  } catch {
    return false
  }
}

/** Keep at most `maxFiles` WAVs in `dir`, deleting the oldest by mtime. Returns removed paths. */
export async function pruneWavFolder(dir: string, maxFiles = DEFAULT_MAX_WAV_FILES) {
  const entries: Dirent[] = await fs.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') return []
    throw error
  })
  const wavs = await Promise.all(
    entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.wav'))
      .map(async (entry) => {
        const filePath = path.join(dir, entry.name)
        const stat = await fs.stat(filePath)
        return { filePath, mtimeMs: stat.mtimeMs }
      })
  )
  if (wavs.length <= maxFiles) return []
  wavs.sort((a, b) => a.mtimeMs - b.mtimeMs)
  const removed = wavs.slice(0, wavs.length - maxFiles).map((entry) => entry.filePath)
  await Promise.all(removed.map((filePath) => fs.rm(filePath, { force: true })))
  return removed
}
