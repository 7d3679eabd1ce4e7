import { describe, expect, it } from 'vitest'

import {
  type SlideBoundary,
  SlideChangeDetector,
  type SlideChangeOptions,
} from '../src/detection/slide-change.js'

const SAME = { structuralScore: 0.99, histogramScore: 0.99 }
const DIFFERENT = { structuralScore: 0.2, histogramScore: 0.3 }

const createDetector = (overrides: Partial<SlideChangeOptions> = {}) =>
  new SlideChangeDetector({
    fps: 10,
    thresholdSsim: 0.9,
    thresholdHist: 0.9,
    frameGap: 10,
    transitionLimit: 3,
    ...overrides,
  })

describe('SlideChangeDetector', () => {
  it('confirms a change after the transition limit', () => {
    const detector = createDetector()
    const boundaries: SlideBoundary[] = []
    for (let frame = 1; frame < 30; frame += 1) {
      const boundary = detector.observe(frame, frame === 15 ? DIFFERENT : SAME)
      if (boundary) boundaries.push(boundary)
    }
    expect(boundaries).toEqual([{ startFrame: 0, frame: 17, timestamp: 1.7 }])
    expect(detector.lastBoundaryFrame).toBe(17)
    expect(detector.state).toBe('stable')
  })

  it('holds a change seen inside the frame gap until the gap has passed', () => {
    const detector = createDetector()
    const hits: number[] = []
    for (let frame = 1; frame < 20; frame += 1) {
      if (detector.observe(frame, frame === 5 ? DIFFERENT : SAME)) hits.push(frame)
      if (frame === 5) expect(detector.state).toBe('changing')
    }
    expect(hits).toEqual([13])
  })

  it('confirms at most one boundary per frame gap on a noisy stream', () => {
    // Park-Miller generator: the same noise on every run.
    let seed = 12345
    const next = () => {
      seed = (seed * 48271) % 2147483647
      return seed / 2147483647
    }
    const totalFrames = 2000
    for (const [frameGap, transitionLimit] of [
      [1, 0],
      [5, 1],
      [12, 3],
    ] as const) {
      const detector = createDetector({ frameGap, transitionLimit })
      const frames: number[] = []
      for (let frame = 1; frame < totalFrames; frame += 1) {
        const boundary = detector.observe(frame, {
          structuralScore: next(),
          histogramScore: next(),
        })
        if (boundary) frames.push(boundary.frame)
      }
      expect(frames.length).toBeGreaterThan(0)
      expect(frames.length).toBeLessThanOrEqual(Math.floor(totalFrames / frameGap))
      frames.forEach((frame, i) => {
        expect(frame - (i === 0 ? 0 : (frames[i - 1] ?? 0))).toBeGreaterThan(frameGap)
      })
    }
  })

  it('uses strict comparisons against both thresholds', () => {
    const detector = createDetector({ frameGap: 0, transitionLimit: 0 })
    expect(detector.observe(1, { structuralScore: 0.9, histogramScore: 0.9 })).toBeNull()
    expect(detector.observe(2, { structuralScore: 0.95, histogramScore: 0.89 })).toEqual({
      startFrame: 0,
      frame: 2,
      timestamp: 0.2,
    })
  })

  it('reports consecutive segments from the last boundary', () => {
    const detector = createDetector({ frameGap: 0, transitionLimit: 0 })
    expect(detector.observe(3, DIFFERENT)?.startFrame).toBe(0)
    expect(detector.observe(8, DIFFERENT)).toEqual({ startFrame: 3, frame: 8, timestamp: 0.8 })
  })

  it('rejects out-of-order frames and a zero fps', () => {
    const detector = createDetector()
    detector.observe(4, SAME)
    expect(() => detector.observe(4, SAME)).toThrow(/increasing order/)
    expect(() => createDetector({ fps: 0 })).toThrow(/positive fps/)
  })
})
