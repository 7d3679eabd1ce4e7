import type { FrameScores, RgbFrame } from './types.js'

export const DEFAULT_HISTOGRAM_BINS = 256

const SSIM_WINDOW = 7
const SSIM_K1 = 0.01
const SSIM_K2 = 0.03
const DATA_RANGE = 255

// Histograms read the blue channel only. Hue shifts confined to red/green are left to the
// structural score.
const HISTOGRAM_CHANNEL = 2

function assertSameSize(a: RgbFrame, b: RgbFrame) {
  if (a.width !== b.width || a.height !== b.height) {
    throw new Error(
      `Cannot compare frames of different sizes (${a.width}x${a.height} vs ${b.width}x${b.height})`
    )
  }
}

export function toGrayscale(frame: RgbFrame): Float64Array {
  const pixels = frame.width * frame.height
  const gray = new Float64Array(pixels)
  for (let i = 0; i < pixels; i += 1) {
    const offset = i * 3
    gray[i] = Math.round(
      0.299 * frame.data[offset] + 0.587 * frame.data[offset + 1] + 0.114 * frame.data[offset + 2]
    )
  }
  return gray
}

type IntegralImages = {
  x: Float64Array
  y: Float64Array
  xx: Float64Array
  yy: Float64Array
  xy: Float64Array
}

function buildIntegrals(a: Float64Array, b: Float64Array, width: number, height: number) {
  const stride = width + 1
  const size = stride * (height + 1)
  const sums: IntegralImages = {
    x: new Float64Array(size),
    y: new Float64Array(size),
    xx: new Float64Array(size),
    yy: new Float64Array(size),
    xy: new Float64Array(size),
  }
  for (let row = 0; row < height; row += 1) {
    let rx = 0
    let ry = 0
    let rxx = 0
    let ryy = 0
    let rxy = 0
    for (let col = 0; col < width; col += 1) {
      const pa = a[row * width + col]
      const pb = b[row * width + col]
      rx += pa
      ry += pb
      rxx += pa * pa
      ryy += pb * pb
      rxy += pa * pb
      const above = row * stride + col + 1
      const here = (row + 1) * stride + col + 1
      sums.x[here] = sums.x[above] + rx
      sums.y[here] = sums.y[above] + ry
      sums.xx[here] = sums.xx[above] + rxx
      sums.yy[here] = sums.yy[above] + ryy
      sums.xy[here] = sums.xy[above] + rxy
    }
  }
  return { sums, stride }
}

function windowSum(table: Float64Array, stride: number, x0: number, y0: number, size: number) {
  const x1 = x0 + size
  const y1 = y0 + size
  return table[y1 * stride + x1] - table[y0 * stride + x1] - table[y1 * stride + x0] + table[y0 * stride + x0]
}

/**
 * Mean structural similarity over grayscale frames with a uniform 7x7 window (shrunk to the
 * largest odd size that fits small frames). Only windows fully inside the frame are scored.
 */
export function structuralSimilarity(a: RgbFrame, b: RgbFrame): number {
  assertSameSize(a, b)
  const { width, height } = a
  const limit = Math.min(SSIM_WINDOW, width, height)
  const win = limit % 2 === 0 ? limit - 1 : limit
  if (win < 1) return 1

  const grayA = toGrayscale(a)
  const grayB = toGrayscale(b)
  const { sums, stride } = buildIntegrals(grayA, grayB, width, height)

  const count = win * win
  const covNorm = count > 1 ? count / (count - 1) : 1
  const c1 = (SSIM_K1 * DATA_RANGE) ** 2
  const c2 = (SSIM_K2 * DATA_RANGE) ** 2

  let total = 0
  let windows = 0
  for (let y = 0; y + win <= height; y += 1) {
    for (let x = 0; x + win <= width; x += 1) {
      const ux = windowSum(sums.x, stride, x, y, win) / count
      const uy = windowSum(sums.y, stride, x, y, win) / count
      const vx = covNorm * (windowSum(sums.xx, stride, x, y, win) / count - ux * ux)
      const vy = covNorm * (windowSum(sums.yy, stride, x, y, win) / count - uy * uy)
      const vxy = covNorm * (windowSum(sums.xy, stride, x, y, win) / count - ux * uy)
      const numerator = (2 * ux * uy + c1) * (2 * vxy + c2)
      const denominator = (ux * ux + uy * uy + c1) * (vx + vy + c2)
      total += numerator / denominator
      windows += 1
    }
  }
  return windows === 0 ? 1 : total / windows
}

export function channelHistogram(frame: RgbFrame, bins: number, channel = HISTOGRAM_CHANNEL) {
  const histogram = new Float64Array(bins)
  const pixels = frame.width * frame.height
  for (let i = 0; i < pixels; i += 1) {
    const value = frame.data[i * 3 + channel]
    histogram[Math.floor((value * bins) / 256)] += 1
  }
  return histogram
}

/** Pearson correlation of two histograms; two flat histograms count as identical. */
export function correlateHistograms(h1: Float64Array, h2: Float64Array): number {
  const n = h1.length
  if (n === 0 || n !== h2.length) {
    throw new Error(`Histogram size mismatch (${h1.length} vs ${h2.length})`)
  }
  let mean1 = 0
  let mean2 = 0
  for (let i = 0; i < n; i += 1) {
    mean1 += h1[i]
    mean2 += h2[i]
  }
  mean1 /= n
  mean2 /= n

  let num = 0
  let d1 = 0
  let d2 = 0
  for (let i = 0; i < n; i += 1) {
    const a = h1[i] - mean1
    const b = h2[i] - mean2
    num += a * b
    d1 += a * a
    d2 += b * b
  }
  const denom = d1 * d2
  if (Math.abs(denom) <= Number.EPSILON) return 1
  return num / Math.sqrt(denom)
}

export function histogramSimilarity(a: RgbFrame, b: RgbFrame, bins = DEFAULT_HISTOGRAM_BINS): number {
  assertSameSize(a, b)
  if (!Number.isInteger(bins) || bins < 2 || bins > 256) {
    throw new Error(`Unsupported histogram bin count: ${bins}`)
  }
  return correlateHistograms(channelHistogram(a, bins), channelHistogram(b, bins))
}

const clampUnit = (value: number) => Math.min(1, Math.max(0, value))

/** Both scores are clamped to [0, 1]; 1 means identical. */
export function compareFrames(
  current: RgbFrame,
  anchor: RgbFrame,
  { histogramBins = DEFAULT_HISTOGRAM_BINS }: { histogramBins?: number } = {}
): FrameScores {
  return {
    structuralScore: clampUnit(structuralSimilarity(current, anchor)),
    histogramScore: clampUnit(histogramSimilarity(current, anchor, histogramBins)),
  }
}
