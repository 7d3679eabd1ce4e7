/** Packed rgb24 pixels, row-major, no padding: `data.length === width * height * 3`. */
export type RgbFrame = {
  width: number
  height: number
  data: Uint8Array
}

export type FrameSize = {
  width: number
  height: number
}

export type FrameScores = {
  structuralScore: number
  histogramScore: number
}
