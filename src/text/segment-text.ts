import path from 'node:path'

import { extractAudioSegment } from '../audio/extract.js'
import { pruneWavFolder, segmentWavPath } from '../audio/workspace.js'
import { AudioExtractionError, describeError } from '../errors.js'
import type { FailureRecorder } from '../failures/recorder.js'
import type { AppLogger } from '../logging/logger.js'
import type { ProcessingSettings } from '../processing/settings.js'
import { summarizeTranscript, type SummaryMode } from '../summary/route.js'
import type { SummarizerCache } from '../summary/summarizer.js'
import { transcribeSegment, type WhisperModel } from '../transcription/whisper.js'

export type SegmentTextSettings = Pick<
  ProcessingSettings,
  | 'whisperModel'
  | 'audioRetryAttempts'
  | 'audioSkipOnFailure'
  | 'summaryMinLength'
  | 'summaryMaxLength'
  | 'summaryModel'
  | 'maxWavFiles'
>

export type SegmentRequest = {
  videoPath: string
  videoId: string
  /** Slide that closes the segment, when already stored. */
  slideId: string | null
  startFrame: number
  endFrame: number
  fps: number
}

export type SegmentTextOutcome =
  | 'transcribed'
  | 'empty'
  | 'audio-failed'
  | 'transcription-failed'
  | 'transcriber-unavailable'

export type SegmentText = {
  transcript: string
  summary: string
  outcome: SegmentTextOutcome
  summaryMode: SummaryMode | null
  wavPath: string | null
}

export type SegmentStatus = {
  message: string
  segmentStart: number
  frame: number
  toolStderr?: string
}

export type SegmentTextPipeline = {
  run: (
    segment: SegmentRequest,
    settings: SegmentTextSettings,
    onStatus?: (status: SegmentStatus) => void
  ) => Promise<SegmentText>
}

export type SegmentTextDeps = {
  audioRoot: string
  logsDir: string
  ffmpegPath: string
  recorder: FailureRecorder
  loadWhisperModel: (size: string) => Promise<WhisperModel>
  summarizers: SummarizerCache
  logger: AppLogger
  /** Defaults to `logger`. */
  transcriptionLogger?: AppLogger
  sleep?: (ms: number) => Promise<void>
}

const emptyText = (outcome: SegmentTextOutcome, wavPath: string | null): SegmentText => ({
  transcript: '',
  summary: '',
  outcome,
  summaryMode: null,
  wavPath,
})

/**
 * Segment audio -> transcript -> summary, one segment at a time. Tool failures are recorded and
 * degrade to empty text; only `audioSkipOnFailure: false` turns an audio failure into an error.
 */
export function createSegmentTextPipeline(deps: SegmentTextDeps): SegmentTextPipeline {
  const { logger } = deps

  const run: SegmentTextPipeline['run'] = async (segment, settings, onStatus) => {
    const range = `${segment.startFrame}→${segment.endFrame}`
    const status = (message: string, toolStderr?: string) =>
      onStatus?.({
        message,
        segmentStart: segment.startFrame,
        frame: segment.endFrame,
        ...(toolStderr ? { toolStderr } : {}),
      })

    const wavPath = segmentWavPath({
      audioRoot: deps.audioRoot,
      videoId: segment.videoId,
      videoPath: segment.videoPath,
      startFrame: segment.startFrame,
      endFrame: segment.endFrame,
    })

    status(`Extracting audio (segment ${range})`)
    const audio = await extractAudioSegment(
      { ...segment, outputPath: wavPath },
      {
        ffmpegPath: deps.ffmpegPath,
        logsDir: deps.logsDir,
        recorder: deps.recorder,
        logger,
        maxAttempts: settings.audioRetryAttempts,
        sleep: deps.sleep,
        onStatus: ({ message, toolStderr }) => status(message, toolStderr),
      }
    )

    const wavDir = path.dirname(wavPath)
    await pruneWavFolder(wavDir, settings.maxWavFiles).catch((error: unknown) => {
      logger.warn('Unable to prune audio working area', { dir: wavDir, error: describeError(error) })
    })

    if (!audio.ok) {
      if (!settings.audioSkipOnFailure) {
        throw new AudioExtractionError(`Audio extraction failed for segment ${range}: ${audio.error}`)
      }
      status(`Audio unavailable for segment ${range}; continuing without text`)
      return emptyText('audio-failed', null)
    }

    status(`Transcribing segment ${range}`)
    const transcription = await transcribeSegment({
      wavPath: audio.wavPath,
      modelSize: settings.whisperModel,
      loadModel: deps.loadWhisperModel,
      recorder: deps.recorder,
      logger: deps.transcriptionLogger ?? logger,
      logsDir: deps.logsDir,
      failureContext: {
        videoId: segment.videoId,
        slideId: segment.slideId,
        startFrame: segment.startFrame,
        endFrame: segment.endFrame,
        attempts: settings.audioRetryAttempts,
      },
    })

    switch (transcription.outcome) {
      case 'unavailable':
        return emptyText('transcriber-unavailable', audio.wavPath)
      case 'failed':
        return emptyText('transcription-failed', audio.wavPath)
      case 'empty':
        return emptyText('empty', audio.wavPath)
      case 'transcribed':
        break
    }

    const summarizer = await deps.summarizers.get(settings.summaryModel)
    const summary = await summarizeTranscript(transcription.text, {
      summarizer,
      lengths: { minLength: settings.summaryMinLength, maxLength: settings.summaryMaxLength },
      logger,
    })
    return {
      transcript: transcription.text,
      summary: summary.summary,
      outcome: 'transcribed',
      summaryMode: summary.mode,
      wavPath: audio.wavPath,
    }
  }

  return { run }
}
