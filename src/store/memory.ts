import { randomUUID } from 'node:crypto'

import type { FailureRecord } from '../failures/recorder.js'

import type { SlideRecord, SlideStore, TextExtractRecord, VideoRecord } from './types.js'

export type MemorySlideStore = SlideStore & {
  findSlide: (slideId: string) => SlideRecord | null
  snapshot: (videoId: string) => {
    video: VideoRecord | null
    slides: SlideRecord[]
    extracts: TextExtractRecord[]
    failures: FailureRecord[]
  }
}

export function createMemorySlideStore({
  now = () => new Date(),
}: { now?: () => Date } = {}): MemorySlideStore {
  const videos = new Map<string, VideoRecord>()
  let slides: SlideRecord[] = []
  let extracts: TextExtractRecord[] = []
  let failures: FailureRecord[] = []

  const slidesOf = (videoId: string) => slides.filter((slide) => slide.videoId === videoId)
  const extractsOf = (videoId: string) => {
    const ids = new Set(slidesOf(videoId).map((slide) => slide.id))
    return extracts.filter((extract) => ids.has(extract.slideId))
  }

  return {
    createVideo: async (input) => {
      const video: VideoRecord = { ...input, id: randomUUID(), createdAt: now().toISOString() }
      videos.set(video.id, video)
      return video
    },
    addSlide: async (input) => {
      if (!videos.has(input.videoId)) throw new Error(`Unknown video ${input.videoId}`)
      const previous = slidesOf(input.videoId).at(-1)
      if (previous && input.frameNumber <= previous.frameNumber) {
        throw new Error(
          `Slide frames must increase (frame ${input.frameNumber} after ${previous.frameNumber})`
        )
      }
      const slide: SlideRecord = { ...input, id: randomUUID() }
      slides.push(slide)
      return slide
    },
    addTextExtract: async (input) => {
      if (!slides.some((slide) => slide.id === input.slideId)) {
        throw new Error(`Unknown slide ${input.slideId}`)
      }
      const extract: TextExtractRecord = { ...input, id: randomUUID() }
      extracts.push(extract)
      return extract
    },
    recordFailure: async (input) => {
      const failure: FailureRecord = { ...input, id: randomUUID(), createdAt: now().toISOString() }
      failures.push(failure)
      return failure
    },
    listSlides: async (videoId) => slidesOf(videoId).map((slide) => ({ ...slide })),
    listTextExtracts: async (videoId) => extractsOf(videoId).map((extract) => ({ ...extract })),
    listFailures: async (videoId) =>
      failures
        .filter((failure) => !videoId || failure.videoId === videoId)
        .map((failure) => ({ ...failure })),
    evictVideo: async (videoId) => {
      const slideIds = new Set(slidesOf(videoId).map((slide) => slide.id))
      videos.delete(videoId)
      slides = slides.filter((slide) => slide.videoId !== videoId)
      extracts = extracts.filter((extract) => !slideIds.has(extract.slideId))
      failures = failures.filter((failure) => failure.videoId !== videoId)
    },
    findSlide: (slideId) => slides.find((slide) => slide.id === slideId) ?? null,
    snapshot: (videoId) => ({
      video: videos.get(videoId) ?? null,
      slides: slidesOf(videoId),
      extracts: extractsOf(videoId),
      failures: failures.filter((failure) => failure.videoId === videoId),
    }),
  }
}
