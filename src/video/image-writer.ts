import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { RgbFrame } from '../frames/types.js'
import { runTool } from '../process/exec.js'

export type SlideImageWriter = (frame: RgbFrame, outputPath: string) => Promise<void>

/** Encode one rgb24 frame to PNG (or whatever the extension implies) through ffmpeg stdin. */
export function createFfmpegImageWriter({ ffmpegPath }: { ffmpegPath: string }): SlideImageWriter {
  return async (frame, outputPath) => {
    await fs.mkdir(path.dirname(outputPath), { recursive: true })
    await runTool({
      command: ffmpegPath,
      args: [
        '-hide_banner',
        '-v',
        'error',
        '-y',
        '-f',
        'rawvideo',
        '-pix_fmt',
        'rgb24',
        '-s',
        `${frame.width}x${frame.height}`,
        '-i',
        '-',
        '-frames:v',
        '1',
        outputPath,
      ],
      errorLabel: 'ffmpeg (slide image)',
      input: frame.data,
      timeoutMs: 60_000,
    })
  }
}

export function slideImageFileName(orderIndex: number, timestamp: number): string {
  return `slide_${orderIndex.toString().padStart(4, '0')}_${timestamp.toFixed(2)}s.png`
}
