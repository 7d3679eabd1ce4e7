import type { ProcessingSettings } from '../processing/settings.js'

import {
  isTerminalStatus,
  type JobLimits,
  type JobSnapshot,
  type ProcessingEvent,
  type ProcessingJob,
} from './types.js'

const TOOL_STDERR_LOG_LIMIT = 8000
const CANCELLED_PERCENT_CEILING = 99.99

export function createJobRecord({
  id,
  videoPath,
  settings,
  now,
}: {
  id: string
  videoPath: string
  settings: ProcessingSettings
  now: number
}): ProcessingJob {
  return {
    id,
    videoPath,
    settings,
    status: 'queued',
    createdAt: now,
    updatedAt: now,
    lastPolledAt: now,
    percentComplete: 0,
    framesProcessed: 0,
    totalFrames: 0,
    fps: null,
    videoId: null,
    error: null,
    cancelRequested: false,
    logs: [],
    extracts: [],
    preview: null,
    gpuDiagnostics: {},
    sampleCount: 0,
    emptySamples: 0,
    slideCount: 0,
    throttle: { lastPercentAt: null, lastPercentValue: 0, lastLogAt: null },
  }
}

/** Append and drop the oldest entries beyond `cap`. */
export function pushBounded<T>(items: T[], item: T, cap: number) {
  items.push(item)
  if (items.length > cap) items.splice(0, items.length - cap)
}

const roundPercent = (value: number) => Math.round(Math.min(100, Math.max(0, value)) * 100) / 100

export function appendJobLog(job: ProcessingJob, message: string, now: number, limits: JobLimits) {
  pushBounded(job.logs, { at: now, message }, limits.maxLogEntries)
}

// Percent and log lines are throttled on separate timers.
function offerPercent(job: ProcessingJob, percent: number, now: number, limits: JobLimits) {
  const value = roundPercent(percent)
  if (value <= job.percentComplete) return false
  const { lastPercentAt, lastPercentValue } = job.throttle
  const due = lastPercentAt === null || now - lastPercentAt >= limits.throttleMs
  const jumped = value - lastPercentValue >= limits.minPercentDelta
  if (!due && !jumped) return false
  job.percentComplete = value
  job.throttle.lastPercentAt = now
  job.throttle.lastPercentValue = value
  return true
}

function offerLog(job: ProcessingJob, message: string, now: number, limits: JobLimits) {
  const { lastLogAt } = job.throttle
  if (lastLogAt !== null && now - lastLogAt < limits.throttleMs) return false
  job.throttle.lastLogAt = now
  appendJobLog(job, message, now, limits)
  return true
}

function addExtract(
  job: ProcessingJob,
  extract: ProcessingJob['extracts'][number],
  limits: JobLimits
) {
  pushBounded(job.extracts, extract, limits.maxExtracts)
}

function truncate(text: string, limit: number) {
  return text.length > limit ? `${text.slice(0, limit)}...(truncated)` : text
}

/**
 * Fold one worker event into the job record. Events after a terminal status are ignored.
 * Returns false when the event was dropped entirely.
 */
export function applyJobEvent(
  job: ProcessingJob,
  event: ProcessingEvent,
  { now, limits }: { now: number; limits: JobLimits }
): boolean {
  if (isTerminalStatus(job.status)) return false
  job.updatedAt = now

  switch (event.type) {
    case 'started': {
      job.status = job.cancelRequested ? 'cancelling' : 'running'
      job.totalFrames = event.totalFrames
      job.fps = event.fps
      job.videoId = event.videoId
      appendJobLog(
        job,
        `Processing started (${event.totalFrames} frames at ${event.fps.toFixed(2)} fps)`,
        now,
        limits
      )
      return true
    }
    case 'progress': {
      job.framesProcessed = Math.max(job.framesProcessed, event.framesProcessed)
      if (event.totalFrames > 0) job.totalFrames = event.totalFrames
      offerPercent(job, event.percent, now, limits)
      offerLog(
        job,
        `Processed ${event.framesProcessed} / ${event.totalFrames} frames (${event.percent.toFixed(2)}%)`,
        now,
        limits
      )
      return true
    }
    case 'slide': {
      job.slideCount += 1
      appendJobLog(
        job,
        `Captured slide at frame ${event.frame} (${event.timestamp.toFixed(2)}s)`,
        now,
        limits
      )
      return true
    }
    case 'preview': {
      job.preview = { frame: event.frame, timestamp: event.timestamp, imagePath: event.imagePath }
      return true
    }
    case 'status': {
      if (typeof event.progress === 'number') offerPercent(job, event.progress, now, limits)
      if (typeof event.framesProcessed === 'number') {
        job.framesProcessed = Math.max(job.framesProcessed, event.framesProcessed)
      }
      if (typeof event.totalFrames === 'number' && event.totalFrames > 0) {
        job.totalFrames = event.totalFrames
      }
      const context =
        typeof event.segmentStart === 'number' && typeof event.frame === 'number'
          ? `segment ${event.segmentStart}→${event.frame}`
          : typeof event.frame === 'number'
            ? `frame ${event.frame}`
            : null
      const line = context && !event.message.includes(context) ? `${event.message} (${context})` : event.message
      // Tool output rides on the status line so it shares that line's throttle slot.
      const stderr = event.toolStderr?.trim()
      offerLog(
        job,
        stderr ? `${line}\nTool output: ${truncate(stderr, TOOL_STDERR_LOG_LIMIT)}` : line,
        now,
        limits
      )
      return true
    }
    case 'gpu': {
      job.gpuDiagnostics = { ...event.diagnostics }
      return true
    }
    case 'text_sample': {
      job.sampleCount += 1
      const sample = event.sample?.trim() ?? ''
      if (!sample) {
        job.emptySamples += 1
        return true
      }
      addExtract(
        job,
        { frame: event.frame, timestamp: event.timestamp, slideId: event.slideId, text: sample },
        limits
      )
      return true
    }
    case 'error': {
      job.status = 'error'
      job.error = event.message
      appendJobLog(job, `Processing error: ${event.message}`, now, limits)
      return true
    }
    case 'cancelled': {
      job.status = 'cancelled'
      job.percentComplete = Math.max(
        job.percentComplete,
        Math.min(roundPercent(event.percent), CANCELLED_PERCENT_CEILING)
      )
      appendJobLog(
        job,
        `Processing cancelled at ${job.percentComplete.toFixed(2)}%`,
        now,
        limits
      )
      return true
    }
    case 'complete': {
      job.status = 'completed'
      job.videoId = event.videoId
      job.percentComplete = 100
      if (job.totalFrames > 0) job.framesProcessed = job.totalFrames
      appendJobLog(job, `Processing complete (${job.slideCount} slides)`, now, limits)
      return true
    }
  }
}

export function toJobSnapshot(job: ProcessingJob): JobSnapshot {
  const { throttle: _throttle, ...rest } = job
  return structuredClone(rest)
}
