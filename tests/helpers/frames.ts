import type { RgbFrame } from '../../src/frames/types.js'

export function solidFrame(width: number, height: number, rgb: [number, number, number]): RgbFrame {
  const data = new Uint8Array(width * height * 3)
  for (let i = 0; i < width * height; i += 1) {
    data[i * 3] = rgb[0]
    data[i * 3 + 1] = rgb[1]
    data[i * 3 + 2] = rgb[2]
  }
  return { width, height, data }
}

/** Vertical gradient in all channels, so windows have variance. */
export function gradientFrame(width: number, height: number, offset = 0): RgbFrame {
  const data = new Uint8Array(width * height * 3)
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const value = (x * 7 + y * 3 + offset) % 256
      const i = (y * width + x) * 3
      data[i] = value
      data[i + 1] = value
      data[i + 2] = value
    }
  }
  return { width, height, data }
}
