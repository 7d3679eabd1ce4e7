import { beforeEach, describe, expect, it, vi } from 'vitest'

const piAiMock = vi.hoisted(() => ({
  getModel: vi.fn(),
  completeSimple: vi.fn(),
}))

vi.mock('@mariozechner/pi-ai', () => piAiMock)

import { createSilentLogger } from '../src/logging/logger.js'
import { parseSummaryModelId } from '../src/summary/model.js'
import {
  createFallbackSummarizer,
  createPiAiSummarizerFactory,
  createSummarizerCache,
  fallbackSummarize,
} from '../src/summary/summarizer.js'

const lengths = { minLength: 30, maxLength: 150 }

describe('summary model ids', () => {
  it('parses provider and model', () => {
    expect(parseSummaryModelId('OpenAI/gpt-5-mini')).toEqual({ provider: 'openai', modelId: 'gpt-5-mini' })
  })

  it('rejects ids without a provider', () => {
    expect(() => parseSummaryModelId('gpt-5-mini')).toThrow(
      'Summary model must be "<provider>/<model>" (got "gpt-5-mini")'
    )
  })
})

describe('pi-ai summarizer factory', () => {
  beforeEach(() => {
    piAiMock.getModel.mockReset()
    piAiMock.completeSimple.mockReset()
  })

  it('falls back without an API key', async () => {
    const summarizer = await createPiAiSummarizerFactory({})('openai/gpt-5-mini')
    expect(summarizer.kind).toBe('fallback')
    expect(summarizer.note).toBe('Missing API key for openai')
    expect(piAiMock.getModel).not.toHaveBeenCalled()
  })

  it('falls back for an unknown provider', async () => {
    const summarizer = await createPiAiSummarizerFactory({})('acme/large')
    expect(summarizer.note).toBe(
      'Unsupported summary provider "acme" (use openai, anthropic, google, xai)'
    )
  })

  it('falls back when the catalog has no such model', async () => {
    piAiMock.getModel.mockReturnValue(undefined)
    const summarizer = await createPiAiSummarizerFactory({ OPENAI_API_KEY: 'test-secret' })(
      'openai/nope'
    )
    expect(summarizer.kind).toBe('fallback')
    expect(summarizer.note).toBe('Unknown summary model openai/nope')
  })

  it('falls back when the catalog entry takes no text input', async () => {
    piAiMock.getModel.mockReturnValue({ id: 'image-only', input: ['image'] })
    const summarizer = await createPiAiSummarizerFactory({ OPENAI_API_KEY: 'test-secret' })(
      'openai/image-only'
    )
    expect(summarizer.note).toBe('Unknown summary model openai/image-only')
  })

  it('joins text blocks of a reply into one line', async () => {
    piAiMock.getModel.mockReturnValue({ id: 'gpt-5-mini', input: ['text'] })
    piAiMock.completeSimple.mockResolvedValue({
      content: [
        { type: 'text', text: 'First part.\n' },
        { type: 'text', text: '   ' },
        { type: 'text', text: '  Second\n\npart.' },
      ],
    })
    const summarizer = await createPiAiSummarizerFactory({ OPENAI_API_KEY: 'test-secret' })(
      'openai/gpt-5-mini'
    )
    expect(await summarizer.summarize('text', lengths)).toBe('First part. Second part.')
  })

  it('calls completeSimple with the key and a token budget', async () => {
    const model = { id: 'gpt-5-mini', provider: 'openai', input: ['text'] }
    piAiMock.getModel.mockReturnValue(model)
    piAiMock.completeSimple.mockResolvedValue({
      content: [
        { type: 'thinking', thinking: 'hmm' },
        { type: 'text', text: ' The slide covers caching. ' },
      ],
    })

    const summarizer = await createPiAiSummarizerFactory({ OPENAI_API_KEY: 'test-secret' })(
      'openai/gpt-5-mini'
    )
    const summary = await summarizer.summarize('a long transcript', lengths)

    expect(summarizer.kind).toBe('model')
    expect(summary).toBe('The slide covers caching.')
    expect(piAiMock.getModel).toHaveBeenCalledWith('openai', 'gpt-5-mini')
    const [calledModel, context, options] = piAiMock.completeSimple.mock.calls[0] ?? []
    expect(calledModel).toBe(model)
    expect(context.messages[0].content).toContain('in 30 to 150 words')
    expect(context.messages[0].content).toContain('<transcript>\na long transcript\n</transcript>')
    expect(options).toEqual({ apiKey: 'test-secret', maxTokens: 600, temperature: 0 })
  })

  it('rejects an empty model reply', async () => {
    piAiMock.getModel.mockReturnValue({ id: 'gpt-5-mini', input: ['text'] })
    piAiMock.completeSimple.mockResolvedValue({ content: [] })
    const summarizer = await createPiAiSummarizerFactory({ OPENAI_API_KEY: 'test-secret' })(
      'openai/gpt-5-mini'
    )
    await expect(summarizer.summarize('text', lengths)).rejects.toThrow(
      'LLM returned an empty summary (model openai/gpt-5-mini).'
    )
  })
})

describe('summarizer cache', () => {
  it('builds each model once', async () => {
    const factory = vi.fn(async (modelId: string) => createFallbackSummarizer(modelId, null))
    const cache = createSummarizerCache({ factory, logger: createSilentLogger() })

    const [a, b] = await Promise.all([cache.get('openai/a'), cache.get('openai/a')])
    await cache.get('openai/b')

    expect(a).toBe(b)
    expect(factory).toHaveBeenCalledTimes(2)
  })

  it('turns a construction error into the fallback', async () => {
    const cache = createSummarizerCache({
      factory: async () => {
        throw new Error('boom')
      },
      logger: createSilentLogger(),
    })
    const summarizer = await cache.get('openai/a')
    expect(summarizer.kind).toBe('fallback')
    expect(summarizer.note).toBe('boom')
  })
})

describe('fallbackSummarize', () => {
  it('returns text within the budget unchanged', () => {
    expect(fallbackSummarize('  short text  ', 10)).toBe('short text')
  })

  it('cuts at the last space inside the budget', () => {
    const text = Array.from({ length: 20 }, () => 'abcd').join(' ')
    expect(fallbackSummarize(text, 10)).toBe(`${Array.from({ length: 12 }, () => 'abcd').join(' ')}...`)
  })
})
