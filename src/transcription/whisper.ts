import { promises as fs } from 'node:fs'
import { availableParallelism } from 'node:os'
import path from 'node:path'

import { describeError, diagnosticText, WhisperUnavailableError } from '../errors.js'
import {
  type FailureRecorder,
  TRANSCRIBER_STDERR_LIMIT,
  truncateDiagnostic,
  writeFailureLog,
} from '../failures/recorder.js'
import type { AppLogger } from '../logging/logger.js'
import { resolveExecutableInPath, runTool } from '../process/exec.js'

export const DEFAULT_WHISPER_MODEL = 'base'

export type WhisperModel = {
  size: string
  modelPath: string
  transcribe: (wavPath: string) => Promise<string>
}

export type WhisperModelLoader = (size: string) => Promise<WhisperModel>

export type WhisperCppOptions = {
  binary: string
  modelDir: string
  env: Record<string, string | undefined>
  threads?: number
}

export type TranscriptionOutcome = 'transcribed' | 'empty' | 'failed' | 'unavailable'

export type TranscriptionResult = {
  text: string
  outcome: TranscriptionOutcome
}

export function resolveWhisperModelPath(modelDir: string, size: string) {
  return path.join(modelDir, `ggml-${size}.bin`)
}

/** whisper.cpp prints one line per segment with `-nt`; join them as plain text. */
export function parseWhisperOutput(stdout: string): string {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !/^\[BLANK_AUDIO\]$/i.test(line))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/** Load a whisper.cpp model by size; CPU only (`-ng`), float32 weights as shipped in ggml files. */
export function createWhisperCppLoader(options: WhisperCppOptions): WhisperModelLoader {
  return async (size) => {
    const binary = resolveExecutableInPath(options.binary, options.env)
    if (!binary) {
      throw new WhisperUnavailableError(
        `whisper.cpp binary not found (${options.binary}); install whisper-cpp or set SLIDESCRIBE_WHISPER_CPP_BINARY`
      )
    }
    const modelPath = resolveWhisperModelPath(options.modelDir, size)
    try {
      await fs.access(modelPath)
    } catch (error) {
      throw new WhisperUnavailableError(`whisper.cpp model not found: ${modelPath}`, { cause: error })
    }
    const threads = options.threads ?? Math.max(1, Math.min(8, availableParallelism()))
    return {
      size,
      modelPath,
      transcribe: async (wavPath) => {
        const { stdout } = await runTool({
          command: binary,
          args: ['-m', modelPath, '-f', wavPath, '-nt', '-np', '-ng', '-t', String(threads)],
          errorLabel: 'whisper.cpp',
        })
        return parseWhisperOutput(stdout.toString('utf8'))
      },
    }
  }
}

export type WhisperModelCache = {
  load: (size: string) => Promise<WhisperModel>
  has: (size: string) => boolean
  clear: () => void
}

/**
 * Memoize model loads by size. Concurrent first calls share one promise; a failed load is
 * evicted so a later call can retry once the model or binary shows up.
 */
export function createWhisperModelCache(loader: WhisperModelLoader): WhisperModelCache {
  const models = new Map<string, Promise<WhisperModel>>()
  const load = (size: string) => {
    const cached = models.get(size)
    if (cached) return cached
    const pending = loader(size).catch((error: unknown) => {
      models.delete(size)
      throw error
    })
    models.set(size, pending)
    return pending
  }
  return {
    load,
    has: (size) => models.has(size),
    clear: () => models.clear(),
  }
}

export async function transcribeSegment({
  wavPath,
  modelSize,
  loadModel,
  recorder,
  logger,
  logsDir,
  failureContext,
}: {
  wavPath: string
  modelSize: string
  loadModel: (size: string) => Promise<WhisperModel>
  recorder: FailureRecorder
  logger: AppLogger
  logsDir: string
  failureContext: {
    videoId: string | null
    slideId: string | null
    startFrame: number
    endFrame: number
    attempts: number
  }
}): Promise<TranscriptionResult> {
  const record = async (error: unknown, attempts: number) => {
    const full = diagnosticText(error)
    const logPath = await writeFailureLog({
      logsDir,
      text: full,
      videoId: failureContext.videoId,
      prefix: 'transcriber',
    }).catch((logError: unknown) => {
      logger.warn('Unable to write failure log', { error: describeError(logError) })
      return null
    })
    await recorder
      .recordFailure({
        ...failureContext,
        attempts,
        tool: 'transcriber',
        error: truncateDiagnostic(full, TRANSCRIBER_STDERR_LIMIT, '...'),
        details: { logPath, modelSize },
      })
      .catch((recordError: unknown) => {
        logger.error('Unable to record transcription failure', {
          error: describeError(recordError),
        })
      })
  }

  let model: WhisperModel
  try {
    model = await loadModel(modelSize)
  } catch (error) {
    logger.warn('Transcriber unavailable', { modelSize, error: describeError(error) })
    await record(error, 0)
    return { text: '', outcome: 'unavailable' }
  }

  try {
    const text = (await model.transcribe(wavPath)).trim()
    if (!text) {
      logger.warn('Transcription returned no text', { wavPath, modelSize })
      return { text: '', outcome: 'empty' }
    }
    return { text, outcome: 'transcribed' }
  } catch (error) {
    logger.warn('Transcription failed', { wavPath, error: describeError(error) })
    await record(error, failureContext.attempts)
    return { text: '', outcome: 'failed' }
  }
}
