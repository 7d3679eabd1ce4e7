import { describeError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'

import { fallbackSummarize, normalizeLengths, type Summarizer, type SummaryLengths } from './summarizer.js'

/** Below this many words the transcript is kept verbatim. */
export const SUMMARY_MIN_WORDS = 100
/** Above this many words the transcript is summarized in two halves. */
export const SUMMARY_SPLIT_WORDS = 1000

export type SummaryMode = 'verbatim' | 'single' | 'split'

export type SummaryResult = {
  summary: string
  mode: SummaryMode
  calls: number
  fellBack: boolean
}

export const splitWords = (text: string) => text.split(/\s+/).filter((word) => word.length > 0)

/**
 * Split at the midpoint, moved forward to the next token ending in "."; that token opens the
 * second half. Without such a token the split stays at the midpoint.
 */
export function splitAtSentence(words: string[]): [string[], string[]] {
  const mid = Math.floor(words.length / 2)
  let index = mid
  while (index < words.length && !words[index]?.endsWith('.')) index += 1
  if (index >= words.length) index = mid
  return [words.slice(0, index), words.slice(index)]
}

export async function summarizeTranscript(
  text: string,
  {
    summarizer,
    lengths,
    logger,
  }: {
    summarizer: Summarizer
    lengths: SummaryLengths
    logger: AppLogger
  }
): Promise<SummaryResult> {
  const words = splitWords(text)
  if (words.length < SUMMARY_MIN_WORDS) {
    return { summary: text.trim(), mode: 'verbatim', calls: 0, fellBack: false }
  }

  const normalized = normalizeLengths(lengths)
  let calls = 0
  let fellBack = false
  const summarizeOnce = async (chunk: string) => {
    calls += 1
    try {
      return (await summarizer.summarize(chunk, normalized)).trim()
    } catch (error) {
      fellBack = true
      logger.warn('Summarizer call failed, using local fallback', {
        modelId: summarizer.modelId,
        error: describeError(error),
      })
      return fallbackSummarize(chunk, normalized.maxLength)
    }
  }

  if (words.length <= SUMMARY_SPLIT_WORDS) {
    return { summary: await summarizeOnce(words.join(' ')), mode: 'single', calls, fellBack }
  }

  const [first, second] = splitAtSentence(words)
  const head = await summarizeOnce(first.join(' '))
  const tail = await summarizeOnce(second.join(' '))
  return { summary: `${head} ${tail}`, mode: 'split', calls, fellBack }
}
