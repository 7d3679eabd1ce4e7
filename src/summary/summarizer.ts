import type { Api, Context, Model } from '@mariozechner/pi-ai'
import { completeSimple } from '@mariozechner/pi-ai'

import { describeError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'

import {
  lookupSummaryModel,
  parseSummaryModelId,
  readSummaryText,
  resolveProviderApiKey,
} from './model.js'

export type SummaryLengths = {
  /** Words. */
  minLength: number
  /** Words; raised to `minLength + 5` when smaller. */
  maxLength: number
}

export type Summarizer = {
  kind: 'model' | 'fallback'
  modelId: string
  /** Why the fallback is in use, when it is. */
  note: string | null
  summarize: (text: string, lengths: SummaryLengths) => Promise<string>
}

export type SummarizerFactory = (modelId: string) => Promise<Summarizer>

const FALLBACK_MIN_CHARS = 64
const FALLBACK_CHARS_PER_WORD = 4

export const normalizeLengths = ({ minLength, maxLength }: SummaryLengths): SummaryLengths => ({
  minLength,
  maxLength: Math.max(maxLength, minLength + 5),
})

/** Character budget is `maxLength * 4`; longer text is cut at the last space and gets "...". */
export function fallbackSummarize(text: string, maxLength: number): string {
  const clean = text.trim()
  const budget = Math.max(FALLBACK_MIN_CHARS, maxLength * FALLBACK_CHARS_PER_WORD)
  if (clean.length <= budget) return clean
  const head = clean.slice(0, budget)
  const cut = head.lastIndexOf(' ')
  return `${(cut > 0 ? head.slice(0, cut) : head).trimEnd()}...`
}

export function createFallbackSummarizer(modelId: string, note: string | null): Summarizer {
  return {
    kind: 'fallback',
    modelId,
    note,
    summarize: async (text, lengths) => fallbackSummarize(text, normalizeLengths(lengths).maxLength),
  }
}

function buildSummaryContext(text: string, { minLength, maxLength }: SummaryLengths): Context {
  return {
    systemPrompt:
      'You summarize lecture transcripts spoken over a single presentation slide. ' +
      'Reply with plain prose only: no headings, no lists, no preamble.',
    messages: [
      {
        role: 'user',
        content:
          `Summarize the following transcript in ${minLength} to ${maxLength} words.\n\n` +
          `<transcript>\n${text}\n</transcript>`,
        timestamp: Date.now(),
      },
    ],
  }
}

export function createModelSummarizer({
  modelId,
  model,
  apiKey,
}: {
  modelId: string
  model: Model<Api>
  apiKey: string
}): Summarizer {
  return {
    kind: 'model',
    modelId,
    note: null,
    summarize: async (text, lengths) => {
      const normalized = normalizeLengths(lengths)
      const result = await completeSimple(model, buildSummaryContext(text, normalized), {
        apiKey,
        maxTokens: Math.max(256, normalized.maxLength * 4),
        temperature: 0,
      })
      const summary = readSummaryText(result)
      if (!summary) throw new Error(`LLM returned an empty summary (model ${modelId}).`)
      return summary
    },
  }
}

/**
 * Resolve a model-backed summarizer, or the local fallback when the provider is unknown, the
 * key is missing or the model id is not in the catalog.
 */
export function createPiAiSummarizerFactory(env: Record<string, string | undefined>): SummarizerFactory {
  return async (modelId) => {
    let spec: ReturnType<typeof parseSummaryModelId>
    try {
      spec = parseSummaryModelId(modelId)
    } catch (error) {
      return createFallbackSummarizer(modelId, describeError(error))
    }
    const apiKey = resolveProviderApiKey(spec.provider, env)
    if (!apiKey) {
      return createFallbackSummarizer(modelId, `Missing API key for ${spec.provider}`)
    }
    const model = lookupSummaryModel(spec)
    if (!model) {
      return createFallbackSummarizer(modelId, `Unknown summary model ${modelId}`)
    }
    return createModelSummarizer({ modelId, model, apiKey })
  }
}

export type SummarizerCache = {
  get: (modelId: string) => Promise<Summarizer>
  clear: () => void
}

/** Builds each summarizer once per model id; construction errors resolve to the fallback. */
export function createSummarizerCache({
  factory,
  logger,
}: {
  factory: SummarizerFactory
  logger: AppLogger
}): SummarizerCache {
  const summarizers = new Map<string, Promise<Summarizer>>()
  const get = (modelId: string) => {
    const cached = summarizers.get(modelId)
    if (cached) return cached
    const pending = factory(modelId)
      .catch((error: unknown) => createFallbackSummarizer(modelId, describeError(error)))
      .then((summarizer) => {
        if (summarizer.kind === 'fallback') {
          logger.warn('Using local fallback summarizer', { modelId, reason: summarizer.note })
        }
        return summarizer
      })
    summarizers.set(modelId, pending)
    return pending
  }
  return { get, clear: () => summarizers.clear() }
}
