import path from 'node:path'

import { resizeFrameArea, scaledDimensions } from '../frames/resize.js'
import type { FrameSize, RgbFrame } from '../frames/types.js'
import { type SlideImageWriter, slideImageFileName } from '../video/image-writer.js'

export type DualResolutionScaler = {
  native: FrameSize
  processing: FrameSize
  target: FrameSize
  toProcessing: (frame: RgbFrame) => RgbFrame
  toTarget: (frame: RgbFrame) => RgbFrame
}

/**
 * Comparison size and persisted size are independent percentages of the native decode; both
 * resizes always start from the native frame.
 */
export function createDualResolutionScaler({
  native,
  scalePercent,
  targetResolutionPercent,
}: {
  native: FrameSize
  scalePercent: number
  targetResolutionPercent: number
}): DualResolutionScaler {
  const processing = scaledDimensions(native, scalePercent)
  const target = scaledDimensions(native, targetResolutionPercent)
  const check = (frame: RgbFrame) => {
    if (frame.width !== native.width || frame.height !== native.height) {
      throw new Error(
        `Expected a ${native.width}x${native.height} frame, got ${frame.width}x${frame.height}`
      )
    }
  }
  return {
    native,
    processing,
    target,
    toProcessing: (frame) => {
      check(frame)
      return resizeFrameArea(frame, processing)
    },
    toTarget: (frame) => {
      check(frame)
      return resizeFrameArea(frame, target)
    },
  }
}

export type PersistedSlideImage = {
  imagePath: string
  width: number
  height: number
}

export async function persistSlideImage({
  frame,
  scaler,
  writer,
  slidesDir,
  orderIndex,
  timestamp,
}: {
  frame: RgbFrame
  scaler: DualResolutionScaler
  writer: SlideImageWriter
  slidesDir: string
  orderIndex: number
  timestamp: number
}): Promise<PersistedSlideImage> {
  const image = scaler.toTarget(frame)
  const imagePath = path.join(slidesDir, slideImageFileName(orderIndex, timestamp))
  await writer(image, imagePath)
  return { imagePath, width: image.width, height: image.height }
}
