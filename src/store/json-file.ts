import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { FailureRecord } from '../failures/recorder.js'

import { createMemorySlideStore } from './memory.js'
import type { SlideStore } from './types.js'

const DOCUMENT_FILE = 'document.json'
const FAILURES_FILE = 'failures.jsonl'

export function resolveVideoDir(outputRoot: string, videoId: string) {
  return path.join(outputRoot, videoId)
}

/**
 * Local stand-in for the persistent store: an in-memory index mirrored to
 * `<root>/<videoId>/document.json`, with failures appended to `failures.jsonl`.
 */
export function createJsonFileSlideStore({
  outputRoot,
  now,
}: {
  outputRoot: string
  now?: () => Date
}): SlideStore {
  const memory = createMemorySlideStore({ now })
  const locks = new Map<string, Promise<void>>()

  // Writes for one video are chained so document.json never interleaves.
  const withVideoLock = async (videoId: string, fn: () => Promise<void>) => {
    const previous = locks.get(videoId) ?? Promise.resolve()
    const current = previous.then(fn)
    // The caller sees the rejection; the chain itself keeps going.
    locks.set(
      videoId,
      current.catch(() => undefined)
    )
    await current
  }

  const writeDocument = async (videoId: string) => {
    const dir = resolveVideoDir(outputRoot, videoId)
    const { video, slides, extracts } = memory.snapshot(videoId)
    const payload = {
      video,
      slideCount: slides.length,
      slides: slides.map((slide) => ({
        ...slide,
        imagePath: path.relative(dir, slide.imagePath) || slide.imagePath,
        text: extracts.find((extract) => extract.slideId === slide.id) ?? null,
      })),
    }
    await fs.mkdir(dir, { recursive: true })
    const target = path.join(dir, DOCUMENT_FILE)
    const temp = `${target}.tmp`
    await fs.writeFile(temp, JSON.stringify(payload, null, 2), 'utf8')
    await fs.rename(temp, target)
  }

  const appendFailure = async (failure: FailureRecord) => {
    const dir = failure.videoId ? resolveVideoDir(outputRoot, failure.videoId) : outputRoot
    await fs.mkdir(dir, { recursive: true })
    await fs.appendFile(path.join(dir, FAILURES_FILE), `${JSON.stringify(failure)}\n`, 'utf8')
  }

  return {
    createVideo: async (input) => {
      const video = await memory.createVideo(input)
      await withVideoLock(video.id, () => writeDocument(video.id))
      return video
    },
    addSlide: async (input) => {
      const slide = await memory.addSlide(input)
      await withVideoLock(slide.videoId, () => writeDocument(slide.videoId))
      return slide
    },
    addTextExtract: async (input) => {
      const extract = await memory.addTextExtract(input)
      const videoId = memory.findSlide(extract.slideId)?.videoId
      if (videoId) await withVideoLock(videoId, () => writeDocument(videoId))
      return extract
    },
    recordFailure: async (input) => {
      const failure = await memory.recordFailure(input)
      await withVideoLock(failure.videoId ?? '', () => appendFailure(failure))
      return failure
    },
    listSlides: memory.listSlides,
    listTextExtracts: memory.listTextExtracts,
    listFailures: memory.listFailures,
    // Waits for pending writes so document.json is complete before the index goes.
    evictVideo: (videoId) => withVideoLock(videoId, () => memory.evictVideo(videoId)),
  }
}
