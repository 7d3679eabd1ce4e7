import path from 'node:path'
import { describe, expect, it } from 'vitest'

import { createDualResolutionScaler, persistSlideImage } from '../src/processing/capture.js'
import type { RgbFrame } from '../src/frames/types.js'
import { slideImageFileName } from '../src/video/image-writer.js'

import { solidFrame } from './helpers/frames.js'

describe('dual-resolution capture', () => {
  it('compares at processing size and persists at target size', async () => {
    const scaler = createDualResolutionScaler({
      native: { width: 640, height: 480 },
      scalePercent: 25,
      targetResolutionPercent: 100,
    })
    const native = solidFrame(640, 480, [10, 20, 30])

    const processing = scaler.toProcessing(native)
    expect([processing.width, processing.height]).toEqual([160, 120])

    const written: Array<{ frame: RgbFrame; outputPath: string }> = []
    const image = await persistSlideImage({
      frame: native,
      scaler,
      writer: async (frame, outputPath) => {
        written.push({ frame, outputPath })
      },
      slidesDir: '/out/video-1/slides',
      orderIndex: 3,
      timestamp: 12.5,
    })

    expect(image).toEqual({
      imagePath: path.join('/out/video-1/slides', 'slide_0003_12.50s.png'),
      width: 640,
      height: 480,
    })
    expect(written).toHaveLength(1)
    expect(written[0]?.frame).toBe(native)
  })

  it('scales the persisted image independently', () => {
    const scaler = createDualResolutionScaler({
      native: { width: 640, height: 480 },
      scalePercent: 25,
      targetResolutionPercent: 50,
    })
    expect(scaler.target).toEqual({ width: 320, height: 240 })
    const target = scaler.toTarget(solidFrame(640, 480, [0, 0, 0]))
    expect(target.data.length).toBe(320 * 240 * 3)
  })

  it('rejects frames that are not at native size', () => {
    const scaler = createDualResolutionScaler({
      native: { width: 64, height: 48 },
      scalePercent: 50,
      targetResolutionPercent: 100,
    })
    expect(() => scaler.toProcessing(solidFrame(32, 24, [0, 0, 0]))).toThrow(
      'Expected a 64x48 frame, got 32x24'
    )
  })

  it('names slide images by order and timestamp', () => {
    expect(slideImageFileName(0, 0)).toBe('slide_0000_0.00s.png')
    expect(slideImageFileName(12, 61.5)).toBe('slide_0012_61.50s.png')
  })
})
