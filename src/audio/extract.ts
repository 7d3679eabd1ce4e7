import { promises as fs } from 'node:fs'
import path from 'node:path'

import { describeError, diagnosticText } from '../errors.js'
import {
  type FailureRecord,
  type FailureRecorder,
  type FailureTool,
  TRANSCODER_STDERR_LIMIT,
  truncateDiagnostic,
  writeFailureLog,
} from '../failures/recorder.js'
import type { AppLogger } from '../logging/logger.js'
import { runTool } from '../process/exec.js'

import { encodeWav, SPEECH_SAMPLE_RATE, slicePcm } from './wav.js'
import { isReusableWav } from './workspace.js'

export const DEFAULT_AUDIO_ATTEMPTS = 3
const BACKOFF_STEP_MS = 600
const TRUNCATED_SUFFIX = '...(truncated)'

export type AudioSegment = {
  videoPath: string
  videoId: string | null
  slideId?: string | null
  startFrame: number
  endFrame: number
  fps: number
  outputPath: string
}

export type AudioStatus = {
  message: string
  toolStderr?: string
}

export type AudioExtractorOptions = {
  ffmpegPath: string
  logsDir: string
  recorder: FailureRecorder
  logger: AppLogger
  maxAttempts?: number
  sleep?: (ms: number) => Promise<void>
  onStatus?: (status: AudioStatus) => void
}

export type AudioExtraction =
  | {
      ok: true
      wavPath: string
      source: 'primary-transcoder' | 'fallback-decoder' | 'reused'
      attempts: number
    }
  | {
      ok: false
      attempts: number
      error: string
      failures: FailureRecord[]
    }

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export function segmentWindow(startFrame: number, endFrame: number, fps: number) {
  return {
    startSeconds: startFrame / fps,
    durationSeconds: (endFrame - startFrame) / fps,
  }
}

async function cutWithTranscoder(segment: AudioSegment, ffmpegPath: string) {
  const { startSeconds, durationSeconds } = segmentWindow(
    segment.startFrame,
    segment.endFrame,
    segment.fps
  )
  await runTool({
    command: ffmpegPath,
    args: [
      '-hide_banner',
      '-nostdin',
      '-y',
      '-ss',
      startSeconds.toFixed(3),
      '-t',
      durationSeconds.toFixed(3),
      '-i',
      segment.videoPath,
      '-vn',
      '-ac',
      '1',
      '-ar',
      String(SPEECH_SAMPLE_RATE),
      '-c:a',
      'pcm_s16le',
      segment.outputPath,
    ],
    errorLabel: 'ffmpeg (audio segment)',
  })
}

// Decode the whole track to raw PCM and cut the window in process, clamped to the real clip length.
async function decodeWithFallback(segment: AudioSegment, ffmpegPath: string) {
  const { startSeconds, durationSeconds } = segmentWindow(
    segment.startFrame,
    segment.endFrame,
    segment.fps
  )
  const { stdout } = await runTool({
    command: ffmpegPath,
    args: [
      '-hide_banner',
      '-nostdin',
      '-v',
      'error',
      '-i',
      segment.videoPath,
      '-vn',
      '-ac',
      '1',
      '-ar',
      String(SPEECH_SAMPLE_RATE),
      '-f',
      's16le',
      '-',
    ],
    errorLabel: 'ffmpeg (full audio decode)',
  })
  const samples = slicePcm(stdout, startSeconds, startSeconds + durationSeconds)
  await fs.writeFile(segment.outputPath, encodeWav(samples))
}

async function recordStageFailure({
  segment,
  options,
  tool,
  error,
  attempts,
}: {
  segment: AudioSegment
  options: AudioExtractorOptions
  tool: FailureTool
  error: unknown
  attempts: number
}): Promise<FailureRecord | null> {
  const full = diagnosticText(error)
  const logPath = await writeFailureLog({
    logsDir: options.logsDir,
    text: full,
    videoId: segment.videoId,
    prefix: tool,
  }).catch((logError: unknown) => {
    options.logger.warn('Unable to write failure log', { tool, error: describeError(logError) })
    return null
  })
  try {
    return await options.recorder.recordFailure({
      videoId: segment.videoId,
      slideId: segment.slideId ?? null,
      startFrame: segment.startFrame,
      endFrame: segment.endFrame,
      attempts,
      tool,
      error: truncateDiagnostic(full, TRANSCODER_STDERR_LIMIT, TRUNCATED_SUFFIX),
      details: { logPath },
    })
  } catch (recordError) {
    options.logger.error('Unable to record audio failure', {
      tool,
      error: describeError(recordError),
    })
    return null
  }
}

/**
 * Primary cut with linear backoff, then the full-decode fallback. Never throws: a segment whose
 * audio cannot be produced comes back as `{ ok: false }` with one failure record per tool.
 */
export async function extractAudioSegment(
  segment: AudioSegment,
  options: AudioExtractorOptions
): Promise<AudioExtraction> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_AUDIO_ATTEMPTS)
  const sleep = options.sleep ?? defaultSleep
  const { logger, onStatus } = options
  const range = `${segment.startFrame}→${segment.endFrame}`

  if (await isReusableWav(segment.outputPath)) {
    return { ok: true, wavPath: segment.outputPath, source: 'reused', attempts: 0 }
  }

  try {
    await fs.mkdir(path.dirname(segment.outputPath), { recursive: true })
  } catch (error) {
    const failure = await recordStageFailure({
      segment,
      options,
      tool: 'primary-transcoder',
      error,
      attempts: 0,
    })
    return {
      ok: false,
      attempts: 0,
      error: describeError(error),
      failures: failure ? [failure] : [],
    }
  }

  let primaryError: unknown = null
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      await cutWithTranscoder(segment, options.ffmpegPath)
      return { ok: true, wavPath: segment.outputPath, source: 'primary-transcoder', attempts: attempt }
    } catch (error) {
      primaryError = error
      logger.warn('Audio extraction attempt failed', {
        attempt,
        maxAttempts,
        segment: range,
        error: describeError(error),
      })
      onStatus?.({
        message: `Audio extraction attempt ${attempt}/${maxAttempts} failed (segment ${range})`,
        toolStderr: diagnosticText(error),
      })
      await sleep(BACKOFF_STEP_MS * attempt)
    }
  }

  onStatus?.({ message: `Falling back to full-track audio decode (segment ${range})` })
  try {
    await decodeWithFallback(segment, options.ffmpegPath)
    logger.info('Audio fallback succeeded', { segment: range })
    return { ok: true, wavPath: segment.outputPath, source: 'fallback-decoder', attempts: maxAttempts + 1 }
  } catch (fallbackError) {
    logger.error('Audio extraction failed after fallback', {
      segment: range,
      primary: describeError(primaryError),
      fallback: describeError(fallbackError),
    })
    const failures: FailureRecord[] = []
    const primary = await recordStageFailure({
      segment,
      options,
      tool: 'primary-transcoder',
      error: primaryError,
      attempts: maxAttempts,
    })
    if (primary) failures.push(primary)
    const fallback = await recordStageFailure({
      segment,
      options,
      tool: 'fallback-decoder',
      error: fallbackError,
      attempts: 1,
    })
    if (fallback) failures.push(fallback)
    await fs.rm(segment.outputPath, { force: true }).catch((rmError: unknown) => {
      logger.warn('Unable to remove partial WAV', { error: describeError(rmError) })
    })
    return {
      ok: false,
      attempts: maxAttempts + 1,
      error: describeError(fallbackError),
      failures,
    }
  }
}
