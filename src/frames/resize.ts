import type { FrameSize, RgbFrame } from './types.js'

type AreaTap = { index: number; weight: number }

/** Percent of native size, rounded per axis. 0, negatives and 100 mean "unchanged". */
export function scaledDimensions(size: FrameSize, percent: number): FrameSize {
  if (!Number.isFinite(percent) || percent <= 0 || percent === 100) {
    return { width: size.width, height: size.height }
  }
  const factor = percent / 100
  return {
    width: Math.max(1, Math.round(size.width * factor)),
    height: Math.max(1, Math.round(size.height * factor)),
  }
}

// Each destination cell averages the source span it covers, weighted by overlap.
function buildAreaTaps(srcSize: number, dstSize: number): AreaTap[][] {
  const scale = srcSize / dstSize
  const taps: AreaTap[][] = []
  for (let d = 0; d < dstSize; d += 1) {
    const begin = d * scale
    const end = Math.min(srcSize, begin + scale)
    const cell: AreaTap[] = []
    let total = 0
    for (let s = Math.floor(begin); s < end; s += 1) {
      const weight = Math.min(end, s + 1) - Math.max(begin, s)
      if (weight <= 0) continue
      cell.push({ index: s, weight })
      total += weight
    }
    if (cell.length === 0) {
      cell.push({ index: Math.min(srcSize - 1, Math.floor(begin)), weight: 1 })
      total = 1
    }
    taps.push(cell.map((tap) => ({ index: tap.index, weight: tap.weight / total })))
  }
  return taps
}

export function resizeFrameArea(frame: RgbFrame, target: FrameSize): RgbFrame {
  if (target.width === frame.width && target.height === frame.height) return frame
  if (target.width < 1 || target.height < 1) {
    throw new Error(`Invalid resize target ${target.width}x${target.height}`)
  }

  const xTaps = buildAreaTaps(frame.width, target.width)
  const yTaps = buildAreaTaps(frame.height, target.height)

  // Horizontal pass into floats, then vertical pass into bytes.
  const rows = new Float64Array(target.width * frame.height * 3)
  for (let y = 0; y < frame.height; y += 1) {
    const srcRow = y * frame.width * 3
    const dstRow = y * target.width * 3
    for (let x = 0; x < target.width; x += 1) {
      let r = 0
      let g = 0
      let b = 0
      for (const tap of xTaps[x] ?? []) {
        const offset = srcRow + tap.index * 3
        r += (frame.data[offset] ?? 0) * tap.weight
        g += (frame.data[offset + 1] ?? 0) * tap.weight
        b += (frame.data[offset + 2] ?? 0) * tap.weight
      }
      const out = dstRow + x * 3
      rows[out] = r
      rows[out + 1] = g
      rows[out + 2] = b
    }
  }

  const data = new Uint8Array(target.width * target.height * 3)
  const stride = target.width * 3
  for (let y = 0; y < target.height; y += 1) {
    const dstRow = y * stride
    for (let i = 0; i < stride; i += 1) {
      let value = 0
      for (const tap of yTaps[y] ?? []) {
        value += (rows[tap.index * stride + i] ?? 0) * tap.weight
      }
      data[dstRow + i] = Math.min(255, Math.max(0, Math.round(value)))
    }
  }

  return { width: target.width, height: target.height, data }
}

export function resizeFramePercent(frame: RgbFrame, percent: number): RgbFrame {
  return resizeFrameArea(frame, scaledDimensions(frame, percent))
}
