import { randomUUID } from 'node:crypto'

import { describeError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import type { ProcessingSettings } from '../processing/settings.js'

import { appendJobLog, applyJobEvent, createJobRecord, toJobSnapshot } from './reducer.js'
import {
  DEFAULT_JOB_LIMITS,
  isTerminalStatus,
  type JobLimits,
  type JobLogEntry,
  type JobSnapshot,
  type JobStatus,
  type ProcessingEvent,
  type ProcessingJob,
} from './types.js'

export type JobRunner = (args: {
  job: JobSnapshot
  signal: AbortSignal
  emit: (event: ProcessingEvent) => void
}) => Promise<void>

export type JobListener = (event: ProcessingEvent, snapshot: JobSnapshot) => void

export type CancelResult =
  | { ok: true; status: JobStatus }
  | { ok: false; reason: 'not-found' | 'finished' }

export type JobRegistryOptions = {
  runner: JobRunner
  logger: AppLogger
  limits?: Partial<JobLimits>
  /** Called with each job dropped by `prune`. */
  onPrune?: (job: JobSnapshot) => void
  clock?: () => number
  createId?: () => string
}

/**
 * Owns every job record. Each record is only touched inside `update`, which runs synchronously,
 * so submitter, worker and cancel requests always see a whole record.
 */
export class JobRegistry {
  readonly limits: JobLimits
  private readonly jobs = new Map<string, ProcessingJob>()
  private readonly workers = new Map<string, Promise<void>>()
  private readonly controllers = new Map<string, AbortController>()
  private readonly listeners = new Map<string, Set<JobListener>>()
  private readonly clock: () => number
  private readonly createId: () => string

  constructor(private readonly options: JobRegistryOptions) {
    this.limits = { ...DEFAULT_JOB_LIMITS, ...options.limits }
    this.clock = options.clock ?? (() => Date.now())
    this.createId = options.createId ?? (() => randomUUID())
  }

  submit({ videoPath, settings }: { videoPath: string; settings: ProcessingSettings }): JobSnapshot {
    this.prune()
    const id = this.createId()
    const now = this.clock()
    const job = createJobRecord({ id, videoPath, settings, now })
    appendJobLog(job, 'Job queued', now, this.limits)
    this.jobs.set(id, job)
    this.controllers.set(id, new AbortController())
    this.options.logger.info('Job queued', { jobId: id, videoPath })
    // Start on a later tick so the caller always sees the queued record first.
    this.workers.set(
      id,
      Promise.resolve().then(() => this.run(id))
    )
    return toJobSnapshot(job)
  }

  get(id: string, { poll = true }: { poll?: boolean } = {}): JobSnapshot | null {
    const job = this.jobs.get(id)
    if (!job) return null
    if (poll) job.lastPolledAt = this.clock()
    return toJobSnapshot(job)
  }

  list({ status }: { status?: JobStatus } = {}): JobSnapshot[] {
    this.prune()
    return [...this.jobs.values()]
      .filter((job) => !status || job.status === status)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(toJobSnapshot)
  }

  logs(id: string, limit = 50): JobLogEntry[] | null {
    const job = this.jobs.get(id)
    if (!job) return null
    job.lastPolledAt = this.clock()
    const count = Math.max(0, Math.trunc(limit))
    return count === 0 ? [] : job.logs.slice(-count).map((entry) => ({ ...entry }))
  }

  cancel(id: string): CancelResult {
    const job = this.jobs.get(id)
    if (!job) return { ok: false, reason: 'not-found' }
    if (isTerminalStatus(job.status)) return { ok: false, reason: 'finished' }
    if (job.status === 'queued') {
      this.update(id, (record, now) => {
        record.cancelRequested = true
        appendJobLog(record, 'Cancellation requested', now, this.limits)
      })
      this.controllers.get(id)?.abort()
      this.options.logger.info('Queued job cancelled', { jobId: id })
      this.dispatch(id, { type: 'cancelled', percent: job.percentComplete })
      return { ok: true, status: job.status }
    }
    if (!job.cancelRequested) {
      this.update(id, (record, now) => {
        record.cancelRequested = true
        record.status = 'cancelling'
        appendJobLog(record, 'Cancellation requested', now, this.limits)
      })
      this.controllers.get(id)?.abort()
      this.options.logger.info('Job cancellation requested', { jobId: id })
      this.notify(id, { type: 'status', message: 'Cancellation requested' })
    }
    return { ok: true, status: job.status }
  }

  /** Listen to every event applied to a job. Returns null for unknown jobs. */
  subscribe(id: string, listener: JobListener): (() => void) | null {
    if (!this.jobs.has(id)) return null
    const set = this.listeners.get(id) ?? new Set<JobListener>()
    set.add(listener)
    this.listeners.set(id, set)
    return () => {
      set.delete(listener)
      if (set.size === 0 && this.listeners.get(id) === set) this.listeners.delete(id)
    }
  }

  async wait(id: string): Promise<JobSnapshot | null> {
    await this.workers.get(id)
    return this.get(id, { poll: false })
  }

  /** Drop terminal jobs nobody has polled within the retention window. */
  prune(): string[] {
    const now = this.clock()
    const removed: string[] = []
    for (const [id, job] of this.jobs) {
      if (!isTerminalStatus(job.status)) continue
      if (now - job.lastPolledAt <= this.limits.retentionMs) continue
      this.jobs.delete(id)
      this.workers.delete(id)
      this.listeners.delete(id)
      removed.push(id)
      this.options.onPrune?.(toJobSnapshot(job))
    }
    return removed
  }

  private update<T>(id: string, fn: (job: ProcessingJob, now: number) => T): T | null {
    const job = this.jobs.get(id)
    if (!job) return null
    const now = this.clock()
    const result = fn(job, now)
    job.updatedAt = now
    return result
  }

  private dispatch(id: string, event: ProcessingEvent) {
    const applied = this.update(id, (job, now) =>
      applyJobEvent(job, event, { now, limits: this.limits })
    )
    if (applied) this.notify(id, event)
  }

  private notify(id: string, event: ProcessingEvent) {
    const set = this.listeners.get(id)
    const job = this.jobs.get(id)
    if (!set || !job) return
    const snapshot = toJobSnapshot(job)
    for (const listener of [...set]) {
      try {
        listener(event, snapshot)
      } catch (error) {
        this.options.logger.warn('Job listener failed', { jobId: id, error: describeError(error) })
      }
    }
  }

  private async run(id: string): Promise<void> {
    const job = this.jobs.get(id)
    const controller = this.controllers.get(id)
    if (!job || !controller) return
    const { logger } = this.options

    if (isTerminalStatus(job.status)) {
      this.controllers.delete(id)
      return
    }

    this.update(id, (record, now) => {
      record.status = 'starting'
      appendJobLog(record, 'Preparing to process video...', now, this.limits)
    })
    this.notify(id, { type: 'status', message: 'Preparing to process video...' })

    try {
      await this.options.runner({
        job: toJobSnapshot(job),
        signal: controller.signal,
        emit: (event) => this.dispatch(id, event),
      })
      const after = this.jobs.get(id)
      if (after && !isTerminalStatus(after.status)) {
        this.dispatch(
          id,
          after.cancelRequested
            ? { type: 'cancelled', percent: after.percentComplete }
            : { type: 'error', message: 'Processing ended without a result' }
        )
      }
      logger.info('Job finished', { jobId: id, status: this.jobs.get(id)?.status })
    } catch (error) {
      logger.error('Job failed', { jobId: id, videoPath: job.videoPath, error })
      this.dispatch(id, { type: 'error', message: describeError(error) })
    } finally {
      this.controllers.delete(id)
    }
  }
}
