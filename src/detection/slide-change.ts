import type { FrameScores } from '../frames/types.js'

export type SlideChangeState = 'stable' | 'changing'

export type SlideChangeOptions = {
  fps: number
  thresholdSsim: number
  thresholdHist: number
  frameGap: number
  transitionLimit: number
}

export type SlideBoundary = {
  /** First frame of the segment that just ended. */
  startFrame: number
  /** Frame at which the new slide was confirmed; also the end (exclusive) of the segment. */
  frame: number
  timestamp: number
}

/**
 * Debounces per-frame comparator scores into confirmed slide boundaries.
 *
 * A score strictly below either threshold marks a pending change. While pending and more than
 * `frameGap` frames past the last boundary, every frame bumps the transition counter, and the
 * boundary is confirmed once the counter exceeds `transitionLimit`. Frame 0 is the implicit
 * first slide and is never reported here.
 */
export class SlideChangeDetector {
  private pending = false
  private transitionCounter = 1
  private lastConfirmedFrame = 0
  private lastFrame = 0

  constructor(private readonly options: SlideChangeOptions) {
    if (!(options.fps > 0)) {
      throw new Error(`Slide detection needs a positive fps (got ${options.fps})`)
    }
  }

  get state(): SlideChangeState {
    return this.pending ? 'changing' : 'stable'
  }

  get lastBoundaryFrame(): number {
    return this.lastConfirmedFrame
  }

  observe(frameIndex: number, scores: FrameScores): SlideBoundary | null {
    if (frameIndex <= this.lastFrame) {
      throw new Error(`Frames must be observed in increasing order (${frameIndex} after ${this.lastFrame})`)
    }
    this.lastFrame = frameIndex

    const { thresholdSsim, thresholdHist, frameGap, transitionLimit, fps } = this.options
    if (scores.structuralScore < thresholdSsim || scores.histogramScore < thresholdHist) {
      this.pending = true
    }
    if (!this.pending) return null
    if (frameIndex - this.lastConfirmedFrame <= frameGap) return null

    this.transitionCounter += 1
    if (this.transitionCounter <= transitionLimit) return null

    const boundary: SlideBoundary = {
      startFrame: this.lastConfirmedFrame,
      frame: frameIndex,
      timestamp: frameIndex / fps,
    }
    this.transitionCounter = 1
    this.pending = false
    this.lastConfirmedFrame = frameIndex
    return boundary
  }
}
