import { describe, expect, it } from 'vitest'

import { resizeFrameArea, resizeFramePercent, scaledDimensions } from '../src/frames/resize.js'

import { solidFrame } from './helpers/frames.js'

describe('scaledDimensions', () => {
  it('scales each axis and rounds', () => {
    expect(scaledDimensions({ width: 640, height: 480 }, 25)).toEqual({ width: 160, height: 120 })
    expect(scaledDimensions({ width: 10, height: 10 }, 33)).toEqual({ width: 3, height: 3 })
  })

  it('keeps the size for 100, zero and non-finite percents', () => {
    const size = { width: 640, height: 480 }
    expect(scaledDimensions(size, 100)).toEqual(size)
    expect(scaledDimensions(size, 0)).toEqual(size)
    expect(scaledDimensions(size, Number.NaN)).toEqual(size)
  })

  it('never goes below one pixel', () => {
    expect(scaledDimensions({ width: 10, height: 10 }, 0.1)).toEqual({ width: 1, height: 1 })
  })
})

describe('resizeFrameArea', () => {
  it('averages the covered source pixels', () => {
    const frame = { width: 2, height: 1, data: new Uint8Array([0, 0, 0, 100, 50, 10]) }
    const out = resizeFrameArea(frame, { width: 1, height: 1 })
    expect(Array.from(out.data)).toEqual([50, 25, 5])
  })

  it('reduces 4x4 quadrants to 2x2', () => {
    const data = new Uint8Array(4 * 4 * 3)
    for (let y = 0; y < 4; y += 1) {
      for (let x = 0; x < 4; x += 1) {
        const value = (y < 2 ? 0 : 2) + (x < 2 ? 0 : 1)
        data.fill(value * 60, (y * 4 + x) * 3, (y * 4 + x) * 3 + 3)
      }
    }
    const out = resizeFrameArea({ width: 4, height: 4, data }, { width: 2, height: 2 })
    expect(Array.from(out.data)).toEqual([0, 0, 0, 60, 60, 60, 120, 120, 120, 180, 180, 180])
  })

  it('returns the same frame when the size matches', () => {
    const frame = solidFrame(4, 4, [1, 2, 3])
    expect(resizeFrameArea(frame, { width: 4, height: 4 })).toBe(frame)
    expect(resizeFramePercent(frame, 100)).toBe(frame)
  })
})
