import type { ProcessingSettings } from '../processing/settings.js'

export type JobStatus =
  | 'queued'
  | 'starting'
  | 'running'
  | 'cancelling'
  | 'completed'
  | 'error'
  | 'cancelled'

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set([
  'completed',
  'error',
  'cancelled',
])

export const isTerminalStatus = (status: JobStatus) => TERMINAL_JOB_STATUSES.has(status)

export type GpuDiagnostics = Record<string, unknown>

export type ProcessingEvent =
  | { type: 'started'; totalFrames: number; fps: number; videoId: string }
  | { type: 'progress'; framesProcessed: number; totalFrames: number; percent: number }
  | {
      type: 'slide'
      frame: number
      timestamp: number
      slideId: string
      imagePath: string
      preview: string | null
    }
  | { type: 'preview'; frame: number; timestamp: number; imagePath: string }
  | {
      type: 'status'
      message: string
      progress?: number
      frame?: number
      segmentStart?: number
      framesProcessed?: number
      totalFrames?: number
      toolStderr?: string
    }
  | { type: 'gpu'; diagnostics: GpuDiagnostics }
  | {
      type: 'text_sample'
      sample: string | null
      frame: number | null
      timestamp: number | null
      slideId: string | null
    }
  | { type: 'error'; message: string }
  | { type: 'cancelled'; percent: number }
  | { type: 'complete'; videoId: string }

export type ProcessingEventType = ProcessingEvent['type']

export type JobLogEntry = {
  /** Epoch milliseconds. */
  at: number
  message: string
}

export type JobExtract = {
  frame: number | null
  timestamp: number | null
  slideId: string | null
  text: string
}

export type JobPreview = {
  frame: number
  timestamp: number
  imagePath: string
}

export type ProcessingJob = {
  id: string
  videoPath: string
  settings: ProcessingSettings
  status: JobStatus
  createdAt: number
  updatedAt: number
  lastPolledAt: number
  percentComplete: number
  framesProcessed: number
  totalFrames: number
  fps: number | null
  videoId: string | null
  error: string | null
  cancelRequested: boolean
  logs: JobLogEntry[]
  extracts: JobExtract[]
  preview: JobPreview | null
  gpuDiagnostics: GpuDiagnostics
  sampleCount: number
  emptySamples: number
  slideCount: number
  throttle: {
    lastPercentAt: number | null
    lastPercentValue: number
    lastLogAt: number | null
  }
}

export type JobSnapshot = Omit<ProcessingJob, 'throttle'>

export type JobLimits = {
  maxLogEntries: number
  maxExtracts: number
  /** Minimum spacing between accepted percent updates, and separately between log lines. */
  throttleMs: number
  /** A percent change at least this large is accepted regardless of spacing. */
  minPercentDelta: number
  /** Terminal jobs nobody polled for this long are dropped. */
  retentionMs: number
}

export const DEFAULT_JOB_LIMITS: JobLimits = {
  maxLogEntries: 200,
  maxExtracts: 50,
  throttleMs: 500,
  minPercentDelta: 1,
  retentionMs: 10 * 60_000,
}
