import { spawn } from 'node:child_process'
import { promises as fs } from 'node:fs'
import path from 'node:path'

import { describeError, VideoSourceError } from '../errors.js'
import type { RgbFrame } from '../frames/types.js'
import { runTool } from '../process/exec.js'

export type VideoInfo = {
  path: string
  fps: number
  width: number
  height: number
  /** Container-reported (or duration-estimated) frame count. */
  frameCount: number
  durationSeconds: number | null
  fileSizeBytes: number
}

export type VideoSource = {
  info: VideoInfo
  frames: () => AsyncIterable<RgbFrame>
  close: () => void
}

export type VideoTools = {
  ffmpegPath: string
  ffprobePath: string
}

type FfprobeStream = {
  codec_type?: unknown
  width?: unknown
  height?: unknown
  r_frame_rate?: unknown
  avg_frame_rate?: unknown
  nb_frames?: unknown
  duration?: unknown
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

function parseRate(raw: unknown): number | null {
  if (typeof raw !== 'string') return null
  const [numRaw, denRaw] = raw.split('/')
  const num = Number(numRaw)
  const den = denRaw === undefined ? 1 : Number(denRaw)
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return null
  const rate = num / den
  return rate > 0 ? rate : null
}

function parsePositive(raw: unknown): number | null {
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : Number.NaN
  return Number.isFinite(value) && value > 0 ? value : null
}

export function parseFfprobeOutput(json: string, videoPath: string, fileSizeBytes: number): VideoInfo {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    throw new VideoSourceError(`ffprobe returned invalid JSON for ${videoPath}`, { cause: error })
  }
  const streams = isRecord(parsed) && Array.isArray(parsed.streams) ? parsed.streams : []
  const stream = streams.find(
    (entry): entry is FfprobeStream => isRecord(entry) && entry.codec_type === 'video'
  )
  if (!stream) throw new VideoSourceError(`No video stream found in ${videoPath}`)

  const fps = parseRate(stream.r_frame_rate) ?? parseRate(stream.avg_frame_rate)
  if (!fps) throw new VideoSourceError(`Unknown frame rate for ${videoPath}`)
  const width = parsePositive(stream.width)
  const height = parsePositive(stream.height)
  if (!width || !height) throw new VideoSourceError(`Unknown frame size for ${videoPath}`)

  const format = isRecord(parsed) && isRecord(parsed.format) ? parsed.format : {}
  const durationSeconds = parsePositive(stream.duration) ?? parsePositive(format.duration)
  const nbFrames = parsePositive(stream.nb_frames)
  const frameCount = nbFrames
    ? Math.trunc(nbFrames)
    : durationSeconds
      ? Math.round(durationSeconds * fps)
      : 0

  return {
    path: videoPath,
    fps,
    width: Math.trunc(width),
    height: Math.trunc(height),
    frameCount,
    durationSeconds,
    fileSizeBytes,
  }
}

export async function readVideoInfo(videoPath: string, tools: Pick<VideoTools, 'ffprobePath'>) {
  const resolved = path.resolve(videoPath)
  const stat = await fs.stat(resolved).catch((error: unknown) => {
    throw new VideoSourceError(`Video file not found: ${resolved}`, { cause: error })
  })
  if (!stat.isFile() || stat.size === 0) {
    throw new VideoSourceError(`Video file is empty or not a file: ${resolved}`)
  }

  const { stdout } = await runTool({
    command: tools.ffprobePath,
    args: [
      '-v',
      'error',
      '-print_format',
      'json',
      '-show_format',
      '-show_streams',
      '-select_streams',
      'v:0',
      resolved,
    ],
    errorLabel: 'ffprobe',
    timeoutMs: 60_000,
  }).catch((error: unknown) => {
    throw new VideoSourceError(`Unable to read video ${resolved}: ${describeError(error)}`, {
      cause: error,
    })
  })

  return parseFfprobeOutput(stdout.toString('utf8'), resolved, stat.size)
}

/** Slice a byte stream into fixed-size frames. A trailing partial frame is dropped. */
export async function* readRawFrames(
  stream: AsyncIterable<Buffer | string>,
  { width, height }: { width: number; height: number }
): AsyncGenerator<RgbFrame> {
  const frameBytes = width * height * 3
  let pending: Buffer = Buffer.alloc(0)
  for await (const chunk of stream) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
    pending = pending.length === 0 ? bytes : Buffer.concat([pending, bytes])
    while (pending.length >= frameBytes) {
      const data = new Uint8Array(frameBytes)
      data.set(pending.subarray(0, frameBytes))
      pending = pending.subarray(frameBytes)
      yield { width, height, data }
    }
  }
}

export async function openVideoSource(videoPath: string, tools: VideoTools): Promise<VideoSource> {
  const info = await readVideoInfo(videoPath, tools)
  const running = new Set<ReturnType<typeof spawn>>()
  let closed = false

  async function* frames(): AsyncGenerator<RgbFrame> {
    const proc = spawn(
      tools.ffmpegPath,
      ['-hide_banner', '-v', 'error', '-i', info.path, '-an', '-f', 'rawvideo', '-pix_fmt', 'rgb24', '-'],
      { stdio: ['ignore', 'pipe', 'pipe'] }
    )
    running.add(proc)
    let stderr = ''
    const exited = new Promise<{ code: number | null; error: Error | null }>((resolve) => {
      proc.on('error', (error) => resolve({ code: null, error }))
      proc.on('close', (code) => resolve({ code, error: null }))
    })
    proc.stderr.setEncoding('utf8')
    proc.stderr.on('data', (chunk: string) => {
      if (stderr.length < 8192) stderr += chunk
    })

    let decoded = 0
    let finished = false
    try {
      for await (const frame of readRawFrames(proc.stdout, info)) {
        decoded += 1
        yield frame
      }
      finished = true
    } finally {
      if (!finished && proc.exitCode === null) proc.kill('SIGKILL')
      running.delete(proc)
    }

    const { code, error } = await exited
    if (error) {
      throw new VideoSourceError(`Unable to start ffmpeg: ${describeError(error)}`, { cause: error })
    }
    // A decoder killed by close() is a cancellation, not a decode failure.
    if (code === 0 || closed) return
    const detail = stderr.trim() ? `: ${stderr.trim()}` : ''
    if (decoded === 0) {
      throw new VideoSourceError(`ffmpeg could not decode ${info.path} (exit ${code})${detail}`)
    }
    throw new VideoSourceError(
      `ffmpeg stopped decoding ${info.path} after ${decoded} frames (exit ${code})${detail}`
    )
  }

  const close = () => {
    closed = true
    for (const proc of running) {
      if (proc.exitCode === null) proc.kill('SIGKILL')
    }
    running.clear()
  }

  return { info, frames, close }
}
