import path from 'node:path'

import { resolveConfigDir, type SlidescribeConfig } from './config.js'
import { describeError } from './errors.js'
import { JobRegistry } from './jobs/registry.js'
import type { JobLimits } from './jobs/types.js'
import type { AppLogger } from './logging/logger.js'
import { processVideo } from './processing/processor.js'
import { resolveProcessingSettings, type ProcessingSettings } from './processing/settings.js'
import { createJsonFileSlideStore } from './store/json-file.js'
import type { SlideStore } from './store/types.js'
import { createPiAiSummarizerFactory, createSummarizerCache } from './summary/summarizer.js'
import { createSegmentTextPipeline } from './text/segment-text.js'
import { createWhisperCppLoader, createWhisperModelCache } from './transcription/whisper.js'
import { createFfmpegImageWriter } from './video/image-writer.js'
import { openVideoSource } from './video/source.js'

export type RuntimePaths = {
  output: string
  audio: string
  failureLogs: string
  whisperModelDir: string
}

export type RuntimeTools = {
  ffmpeg: string
  ffprobe: string
  whisperCpp: string
}

export type Runtime = {
  registry: JobRegistry
  store: SlideStore
  paths: RuntimePaths
  tools: RuntimeTools
  /** Request settings over config-file defaults over built-in defaults. */
  resolveSettings: (input?: Record<string, unknown>) => ProcessingSettings
}

const nonEmpty = (value: string | undefined) => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function resolveRuntimePaths({
  env,
  config,
  cwd,
  outputOverride,
}: {
  env: Record<string, string | undefined>
  config: SlidescribeConfig | null
  cwd: string
  outputOverride?: string | null
}): RuntimePaths {
  const base = resolveConfigDir(env) ?? path.join(cwd, '.slidescribe')
  return {
    output: path.resolve(cwd, outputOverride ?? config?.paths?.output ?? 'slidescribe-output'),
    audio: path.resolve(cwd, config?.paths?.audio ?? path.join(base, 'audio')),
    failureLogs: path.resolve(
      cwd,
      config?.paths?.failureLogs ?? path.join(base, 'logs', 'audio_failures')
    ),
    whisperModelDir: path.resolve(
      cwd,
      nonEmpty(env.SLIDESCRIBE_WHISPER_MODEL_DIR) ??
        config?.tools?.whisperModelDir ??
        path.join(base, 'models')
    ),
  }
}

export function resolveRuntimeTools({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: SlidescribeConfig | null
}): RuntimeTools {
  return {
    ffmpeg: nonEmpty(env.SLIDESCRIBE_FFMPEG_PATH) ?? config?.tools?.ffmpeg ?? 'ffmpeg',
    ffprobe: nonEmpty(env.SLIDESCRIBE_FFPROBE_PATH) ?? config?.tools?.ffprobe ?? 'ffprobe',
    whisperCpp:
      nonEmpty(env.SLIDESCRIBE_WHISPER_CPP_BINARY) ?? config?.tools?.whisperCpp ?? 'whisper-cli',
  }
}

export function resolveJobLimits(config: SlidescribeConfig | null): Partial<JobLimits> {
  const jobs = config?.jobs
  return {
    ...(typeof jobs?.throttleMs === 'number' ? { throttleMs: jobs.throttleMs } : {}),
    ...(typeof jobs?.minPercentDelta === 'number' ? { minPercentDelta: jobs.minPercentDelta } : {}),
    ...(typeof jobs?.maxLogEntries === 'number' ? { maxLogEntries: jobs.maxLogEntries } : {}),
    ...(typeof jobs?.maxExtracts === 'number' ? { maxExtracts: jobs.maxExtracts } : {}),
    ...(typeof jobs?.retentionMinutes === 'number'
      ? { retentionMs: jobs.retentionMinutes * 60_000 }
      : {}),
  }
}

export function createRuntime({
  env,
  config,
  cwd,
  logger,
  outputOverride,
}: {
  env: Record<string, string | undefined>
  config: SlidescribeConfig | null
  cwd: string
  logger: AppLogger
  outputOverride?: string | null
}): Runtime {
  const paths = resolveRuntimePaths({ env, config, cwd, outputOverride })
  const tools = resolveRuntimeTools({ env, config })
  const store = createJsonFileSlideStore({ outputRoot: paths.output })

  const whisperModels = createWhisperModelCache(
    createWhisperCppLoader({ binary: tools.whisperCpp, modelDir: paths.whisperModelDir, env })
  )
  const summarizers = createSummarizerCache({
    factory: createPiAiSummarizerFactory(env),
    logger: logger.getSubLogger({ name: 'summary' }),
  })
  const segmentText = createSegmentTextPipeline({
    audioRoot: paths.audio,
    logsDir: paths.failureLogs,
    ffmpegPath: tools.ffmpeg,
    recorder: store,
    loadWhisperModel: whisperModels.load,
    summarizers,
    logger: logger.getSubLogger({ name: 'audio' }),
    transcriptionLogger: logger.getSubLogger({ name: 'transcription' }),
  })

  const processorLogger = logger.getSubLogger({ name: 'processor' })
  const writeImage = createFfmpegImageWriter({ ffmpegPath: tools.ffmpeg })
  const registry = new JobRegistry({
    logger: logger.getSubLogger({ name: 'jobs' }),
    limits: resolveJobLimits(config),
    onPrune: (job) => {
      if (!job.videoId) return
      const videoId = job.videoId
      void store.evictVideo(videoId).catch((error: unknown) => {
        processorLogger.warn('Unable to evict pruned video', { videoId, error: describeError(error) })
      })
    },
    runner: async ({ job, signal, emit }) => {
      await processVideo({
        videoPath: job.videoPath,
        settings: job.settings,
        outputRoot: paths.output,
        signal,
        emit,
        deps: {
          openVideo: (videoPath) =>
            openVideoSource(videoPath, { ffmpegPath: tools.ffmpeg, ffprobePath: tools.ffprobe }),
          writeImage,
          store,
          segmentText,
          logger: processorLogger,
        },
      })
    },
  })

  return {
    registry,
    store,
    paths,
    tools,
    resolveSettings: (input = {}) => resolveProcessingSettings(input, config?.processing ?? {}),
  }
}
