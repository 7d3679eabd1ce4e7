export type ProcessingSettings = {
  thresholdSsim: number
  thresholdHist: number
  frameGap: number
  transitionLimit: number
  scalePercent: number
  targetResolutionPercent: number
  histogramBins: number
  audioRetryAttempts: number
  audioSkipOnFailure: boolean
  summaryMinLength: number
  summaryMaxLength: number
  minSlideAudioSeconds: number
  whisperModel: string
  summaryModel: string
  progressInterval: number
  previewInterval: number
  maxWavFiles: number
}

export type ProcessingSettingsInput = Partial<Record<keyof ProcessingSettings, unknown>>

export const DEFAULT_PROCESSING_SETTINGS: ProcessingSettings = {
  thresholdSsim: 0.9,
  thresholdHist: 0.9,
  frameGap: 10,
  transitionLimit: 3,
  scalePercent: 100,
  targetResolutionPercent: 100,
  histogramBins: 256,
  audioRetryAttempts: 3,
  audioSkipOnFailure: true,
  summaryMinLength: 30,
  summaryMaxLength: 150,
  minSlideAudioSeconds: 0,
  whisperModel: 'base',
  summaryModel: 'openai/gpt-5-mini',
  progressInterval: 25,
  previewInterval: 150,
  maxWavFiles: 200,
}

const WHISPER_MODEL_PATTERN = /^[a-z0-9][a-z0-9._-]*$/i

const parseBoolean = (raw: unknown, label: string): boolean | null => {
  if (raw == null) return null
  if (typeof raw === 'boolean') return raw
  const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  throw new Error(`Unsupported ${label}: ${String(raw)}`)
}

const parseInteger = (raw: unknown, label: string, { min, max }: { min: number; max?: number }) => {
  if (raw == null) return null
  const value = typeof raw === 'string' ? raw.trim() : raw
  const numeric = typeof value === 'number' ? value : value === '' ? Number.NaN : Number(value)
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
    throw new Error(`Unsupported ${label}: ${String(raw)}`)
  }
  if (numeric < min) {
    throw new Error(`Unsupported ${label}: ${String(raw)} (minimum ${min})`)
  }
  if (typeof max === 'number' && numeric > max) {
    throw new Error(`Unsupported ${label}: ${String(raw)} (maximum ${max})`)
  }
  return numeric
}

const parseNumberInRange = (
  raw: unknown,
  label: string,
  { min, max }: { min: number; max: number }
): number | null => {
  if (raw == null) return null
  const value = typeof raw === 'string' ? raw.trim() : raw
  const numeric = typeof value === 'number' ? value : value === '' ? Number.NaN : Number(value)
  if (!Number.isFinite(numeric)) {
    throw new Error(`Unsupported ${label}: ${String(raw)}`)
  }
  if (numeric < min || numeric > max) {
    throw new Error(`Unsupported ${label}: ${String(raw)} (range ${min}-${max})`)
  }
  return numeric
}

const parseName = (raw: unknown, label: string, pattern?: RegExp): string | null => {
  if (raw == null) return null
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new Error(`Unsupported ${label}: ${String(raw)}`)
  }
  const value = raw.trim()
  if (pattern && !pattern.test(value)) {
    throw new Error(`Unsupported ${label}: ${value}`)
  }
  return value
}

/**
 * Validate request settings layered over optional defaults (e.g. the config file's
 * `processing` section). Absent fields fall through; present but invalid fields throw.
 */
export function resolveProcessingSettings(
  input: Record<string, unknown> = {},
  defaults: Record<string, unknown> = {}
): ProcessingSettings {
  const pick = (key: keyof ProcessingSettings): unknown => input[key] ?? defaults[key]
  const base = DEFAULT_PROCESSING_SETTINGS

  const summaryMinLength =
    parseInteger(pick('summaryMinLength'), 'summary min length', { min: 1 }) ??
    base.summaryMinLength
  const summaryMaxLength =
    parseInteger(pick('summaryMaxLength'), 'summary max length', { min: 1 }) ??
    base.summaryMaxLength

  return {
    thresholdSsim:
      parseNumberInRange(pick('thresholdSsim'), 'SSIM threshold', { min: 0, max: 1 }) ??
      base.thresholdSsim,
    thresholdHist:
      parseNumberInRange(pick('thresholdHist'), 'histogram threshold', { min: 0, max: 1 }) ??
      base.thresholdHist,
    frameGap: parseInteger(pick('frameGap'), 'frame gap', { min: 0 }) ?? base.frameGap,
    transitionLimit:
      parseInteger(pick('transitionLimit'), 'transition limit', { min: 0 }) ??
      base.transitionLimit,
    scalePercent:
      parseNumberInRange(pick('scalePercent'), 'scale percent', { min: 1, max: 100 }) ??
      base.scalePercent,
    targetResolutionPercent:
      parseNumberInRange(pick('targetResolutionPercent'), 'target resolution percent', {
        min: 1,
        max: 100,
      }) ?? base.targetResolutionPercent,
    histogramBins:
      parseInteger(pick('histogramBins'), 'histogram bins', { min: 2, max: 256 }) ??
      base.histogramBins,
    audioRetryAttempts:
      parseInteger(pick('audioRetryAttempts'), 'audio retry attempts', { min: 1, max: 10 }) ??
      base.audioRetryAttempts,
    audioSkipOnFailure:
      parseBoolean(pick('audioSkipOnFailure'), 'audio skip on failure') ??
      base.audioSkipOnFailure,
    summaryMinLength,
    summaryMaxLength: Math.max(summaryMaxLength, summaryMinLength + 5),
    minSlideAudioSeconds:
      parseNumberInRange(pick('minSlideAudioSeconds'), 'min slide audio seconds', {
        min: 0,
        max: 3600,
      }) ?? base.minSlideAudioSeconds,
    whisperModel:
      parseName(pick('whisperModel'), 'whisper model', WHISPER_MODEL_PATTERN) ?? base.whisperModel,
    summaryModel: parseName(pick('summaryModel'), 'summary model') ?? base.summaryModel,
    progressInterval:
      parseInteger(pick('progressInterval'), 'progress interval', { min: 1 }) ??
      base.progressInterval,
    previewInterval:
      parseInteger(pick('previewInterval'), 'preview interval', { min: 1 }) ??
      base.previewInterval,
    maxWavFiles: parseInteger(pick('maxWavFiles'), 'max wav files', { min: 1 }) ?? base.maxWavFiles,
  }
}
