import type { FailureRecord, FailureRecorder } from '../failures/recorder.js'

export type VideoRecord = {
  id: string
  path: string
  fps: number
  width: number
  height: number
  frameCount: number
  createdAt: string
}

export type SlideRecord = {
  id: string
  videoId: string
  frameNumber: number
  /** Seconds, `frameNumber / fps`. */
  timestamp: number
  imagePath: string
  orderIndex: number
  width: number
  height: number
}

export type TextExtractRecord = {
  id: string
  slideId: string
  /** Raw transcript of the segment that ended at the slide's frame. */
  originalText: string
  /** Summary (or the transcript itself when short). */
  suggestedText: string
  startFrame: number
  endFrame: number
}

export type SlideStore = FailureRecorder & {
  createVideo: (input: Omit<VideoRecord, 'id' | 'createdAt'>) => Promise<VideoRecord>
  addSlide: (input: Omit<SlideRecord, 'id'>) => Promise<SlideRecord>
  addTextExtract: (input: Omit<TextExtractRecord, 'id'>) => Promise<TextExtractRecord>
  listSlides: (videoId: string) => Promise<SlideRecord[]>
  listTextExtracts: (videoId: string) => Promise<TextExtractRecord[]>
  listFailures: (videoId?: string) => Promise<FailureRecord[]>
  /** Drop a video's records from memory; anything already persisted stays where it is. */
  evictVideo: (videoId: string) => Promise<void>
}
