import type { Api, AssistantMessage, KnownProvider, Model } from '@mariozechner/pi-ai'
import { getModel } from '@mariozechner/pi-ai'

export const SUMMARY_PROVIDER_KEYS = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GEMINI_API_KEY',
  xai: 'XAI_API_KEY',
} as const satisfies Partial<Record<KnownProvider, string>>

export type SummaryProvider = keyof typeof SUMMARY_PROVIDER_KEYS

export type SummaryModelSpec = {
  provider: SummaryProvider
  modelId: string
}

const isSummaryProvider = (value: string): value is SummaryProvider =>
  Object.prototype.hasOwnProperty.call(SUMMARY_PROVIDER_KEYS, value)

/** `openai/gpt-5-mini` -> { provider: 'openai', modelId: 'gpt-5-mini' } */
export function parseSummaryModelId(raw: string): SummaryModelSpec {
  const trimmed = raw.trim()
  const slash = trimmed.indexOf('/')
  const provider = slash > 0 ? trimmed.slice(0, slash).toLowerCase() : ''
  const modelId = slash > 0 ? trimmed.slice(slash + 1).trim() : ''
  if (!provider || !modelId) {
    throw new Error(`Summary model must be "<provider>/<model>" (got "${raw}")`)
  }
  if (!isSummaryProvider(provider)) {
    throw new Error(
      `Unsupported summary provider "${provider}" (use ${Object.keys(SUMMARY_PROVIDER_KEYS).join(', ')})`
    )
  }
  return { provider, modelId }
}

export function resolveProviderApiKey(
  provider: SummaryProvider,
  env: Record<string, string | undefined>
): string | null {
  const value = env[SUMMARY_PROVIDER_KEYS[provider]]?.trim()
  if (value) return value
  if (provider === 'google') return env.GOOGLE_GENERATIVE_AI_API_KEY?.trim() || null
  return null
}

/**
 * Catalog entry for a parsed summary model, or null when pi-ai does not list it or the entry
 * cannot take text input.
 */
export function lookupSummaryModel({ provider, modelId }: SummaryModelSpec): Model<Api> | null {
  let model: Model<Api> | undefined
  try {
    // Ids come from settings, so they cannot match the catalog's literal id types.
    model = getModel(provider, modelId as never) as unknown as Model<Api> | undefined
  } catch {
    return null
  }
  if (!model || !model.input.includes('text')) return null
  return model
}

/** Text blocks of a reply as one line of prose; thinking and tool blocks are dropped. */
export function readSummaryText(message: AssistantMessage): string {
  const parts: string[] = []
  for (const block of message.content) {
    if (block.type === 'text' && block.text.trim()) parts.push(block.text.trim())
  }
  return parts.join(' ').replace(/\s+/g, ' ')
}
