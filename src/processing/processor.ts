import path from 'node:path'

import { SlideChangeDetector } from '../detection/slide-change.js'
import { describeError } from '../errors.js'
import { compareFrames } from '../frames/compare.js'
import type { RgbFrame } from '../frames/types.js'
import type { ProcessingEvent } from '../jobs/types.js'
import type { AppLogger } from '../logging/logger.js'
import { resolveVideoDir } from '../store/json-file.js'
import type { SlideRecord, SlideStore } from '../store/types.js'
import type { SegmentText, SegmentTextPipeline } from '../text/segment-text.js'
import type { SlideImageWriter } from '../video/image-writer.js'
import type { VideoSource } from '../video/source.js'

import { createDualResolutionScaler, persistSlideImage } from './capture.js'
import type { ProcessingSettings } from './settings.js'

const PREVIEW_TEXT_CHARS = 280
const MAX_RUNNING_PERCENT = 99.99

export type ProcessorDeps = {
  openVideo: (videoPath: string) => Promise<VideoSource>
  writeImage: SlideImageWriter
  store: SlideStore
  segmentText: SegmentTextPipeline
  logger: AppLogger
}

export type ProcessVideoResult = {
  videoId: string
  outcome: 'completed' | 'cancelled'
  framesProcessed: number
  slides: SlideRecord[]
}

const previewText = (text: string) =>
  text.length > PREVIEW_TEXT_CHARS ? `${text.slice(0, PREVIEW_TEXT_CHARS).trimEnd()}...` : text

/**
 * Decode, compare consecutive frames at processing resolution, and turn confirmed boundaries
 * into stored slides with the transcript of the span each slide was on screen. Cancellation is
 * checked once per frame.
 */
export async function processVideo({
  videoPath,
  settings,
  outputRoot,
  signal,
  emit,
  deps,
}: {
  videoPath: string
  settings: ProcessingSettings
  outputRoot: string
  signal: AbortSignal
  emit: (event: ProcessingEvent) => void
  deps: ProcessorDeps
}): Promise<ProcessVideoResult> {
  const { logger, store } = deps
  const source = await deps.openVideo(videoPath)
  try {
    const { info } = source
    const video = await store.createVideo({
      path: info.path,
      fps: info.fps,
      width: info.width,
      height: info.height,
      frameCount: info.frameCount,
    })
    const videoDir = resolveVideoDir(outputRoot, video.id)
    const slidesDir = path.join(videoDir, 'slides')
    const scaler = createDualResolutionScaler({
      native: info,
      scalePercent: settings.scalePercent,
      targetResolutionPercent: settings.targetResolutionPercent,
    })
    const detector = new SlideChangeDetector({
      fps: info.fps,
      thresholdSsim: settings.thresholdSsim,
      thresholdHist: settings.thresholdHist,
      frameGap: settings.frameGap,
      transitionLimit: settings.transitionLimit,
    })

    emit({ type: 'started', totalFrames: info.frameCount, fps: info.fps, videoId: video.id })
    emit({
      type: 'gpu',
      diagnostics: {
        accelerator: 'none',
        comparator: 'cpu',
        transcriber: 'whisper.cpp (--no-gpu)',
        processingSize: `${scaler.processing.width}x${scaler.processing.height}`,
        targetSize: `${scaler.target.width}x${scaler.target.height}`,
      },
    })
    emit({
      type: 'status',
      message: `Comparing at ${scaler.processing.width}x${scaler.processing.height}, saving slides at ${scaler.target.width}x${scaler.target.height}`,
    })

    const slides: SlideRecord[] = []
    let current: SlideRecord | null = null
    let segmentStart = 0
    let previous: RgbFrame | null = null
    let framesProcessed = 0

    const percentOf = (frames: number) =>
      info.frameCount > 0 ? Math.min(MAX_RUNNING_PERCENT, (frames * 100) / info.frameCount) : 0

    const captureSlide = async (frame: RgbFrame, frameNumber: number) => {
      const timestamp = frameNumber / info.fps
      const orderIndex = slides.length
      const image = await persistSlideImage({
        frame,
        scaler,
        writer: deps.writeImage,
        slidesDir,
        orderIndex,
        timestamp,
      })
      const slide = await store.addSlide({
        videoId: video.id,
        frameNumber,
        timestamp,
        imagePath: image.imagePath,
        orderIndex,
        width: image.width,
        height: image.height,
      })
      slides.push(slide)
      return slide
    }

    const runSegmentText = async (slide: SlideRecord, startFrame: number, endFrame: number) => {
      const text = await deps.segmentText.run(
        {
          videoPath: info.path,
          videoId: video.id,
          slideId: slide.id,
          startFrame,
          endFrame,
          fps: info.fps,
        },
        settings,
        (status) => emit({ type: 'status', ...status })
      )
      try {
        await store.addTextExtract({
          slideId: slide.id,
          originalText: text.transcript,
          suggestedText: text.summary,
          startFrame,
          endFrame,
        })
      } catch (error) {
        logger.warn('Unable to persist text extract', {
          slideId: slide.id,
          error: describeError(error),
        })
      }
      emit({
        type: 'text_sample',
        sample: text.transcript || null,
        frame: slide.frameNumber,
        timestamp: slide.timestamp,
        slideId: slide.id,
      })
      return text
    }

    // A slide is reported once the span it was on screen is closed.
    const finishSlide = (slide: SlideRecord, text: SegmentText | null) => {
      emit({
        type: 'slide',
        frame: slide.frameNumber,
        timestamp: slide.timestamp,
        slideId: slide.id,
        imagePath: slide.imagePath,
        preview: text?.summary ? previewText(text.summary) : null,
      })
    }

    let cancelled = false
    for await (const frame of source.frames()) {
      if (signal.aborted) {
        cancelled = true
        break
      }
      const frameIndex = framesProcessed
      const processing = scaler.toProcessing(frame)

      if (!current) {
        current = await captureSlide(frame, frameIndex)
        segmentStart = frameIndex
      } else if (previous) {
        const scores = compareFrames(processing, previous, { histogramBins: settings.histogramBins })
        const boundary = detector.observe(frameIndex, scores)
        if (boundary) {
          const seconds = (boundary.frame - segmentStart) / info.fps
          if (settings.minSlideAudioSeconds > 0 && seconds < settings.minSlideAudioSeconds) {
            logger.warn('Deferring short segment', {
              videoId: video.id,
              segmentStart,
              frame: boundary.frame,
              seconds,
            })
            emit({
              type: 'status',
              message: `Deferred short segment (${seconds.toFixed(2)}s < ${settings.minSlideAudioSeconds}s)`,
              segmentStart,
              frame: boundary.frame,
            })
          } else {
            const text = await runSegmentText(current, segmentStart, boundary.frame)
            finishSlide(current, text)
            current = await captureSlide(frame, boundary.frame)
            segmentStart = boundary.frame
          }
        }
      }

      previous = processing
      framesProcessed += 1

      if (framesProcessed % settings.previewInterval === 0) {
        const imagePath = path.join(videoDir, 'preview.png')
        await deps.writeImage(processing, imagePath).then(
          () =>
            emit({
              type: 'preview',
              frame: frameIndex,
              timestamp: frameIndex / info.fps,
              imagePath,
            }),
          (error: unknown) => {
            logger.warn('Unable to write preview', { error: describeError(error) })
          }
        )
      }
      if (framesProcessed % settings.progressInterval === 0) {
        emit({
          type: 'progress',
          framesProcessed,
          totalFrames: Math.max(info.frameCount, framesProcessed),
          percent: percentOf(framesProcessed),
        })
      }
    }

    if (!cancelled && signal.aborted) cancelled = true

    if (current) {
      const seconds = (framesProcessed - segmentStart) / info.fps
      if (cancelled || framesProcessed <= segmentStart) {
        finishSlide(current, null)
      } else if (settings.minSlideAudioSeconds > 0 && seconds < settings.minSlideAudioSeconds) {
        emit({
          type: 'status',
          message: `Dropped short final segment (${seconds.toFixed(2)}s)`,
          segmentStart,
          frame: framesProcessed,
        })
        finishSlide(current, null)
      } else {
        finishSlide(current, await runSegmentText(current, segmentStart, framesProcessed))
      }
    }

    if (cancelled) {
      logger.info('Processing cancelled', { videoId: video.id, framesProcessed })
      emit({ type: 'cancelled', percent: percentOf(framesProcessed) })
      return { videoId: video.id, outcome: 'cancelled', framesProcessed, slides }
    }

    logger.info('Processing complete', { videoId: video.id, slides: slides.length, framesProcessed })
    emit({ type: 'complete', videoId: video.id })
    return { videoId: video.id, outcome: 'completed', framesProcessed, slides }
  } finally {
    source.close()
  }
}
