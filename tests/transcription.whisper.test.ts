import { chmodSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import { ProcessError, WhisperUnavailableError } from '../src/errors.js'
import { createSilentLogger } from '../src/logging/logger.js'
import { createMemorySlideStore } from '../src/store/memory.js'
import {
  createWhisperCppLoader,
  createWhisperModelCache,
  parseWhisperOutput,
  transcribeSegment,
  type WhisperModel,
} from '../src/transcription/whisper.js'

import { exitWith, FakeProcess } from './helpers/process.js'

const failureContext = { videoId: 'vid-1', slideId: 'slide-1', startFrame: 0, endFrame: 50, attempts: 3 }

const fakeModel = (transcribe: WhisperModel['transcribe']): WhisperModel => ({
  size: 'base',
  modelPath: '/models/ggml-base.bin',
  transcribe,
})

describe('parseWhisperOutput', () => {
  it('joins segment lines and drops blank-audio markers', () => {
    expect(parseWhisperOutput(' Hello there.\n[BLANK_AUDIO]\n\n  General   Kenobi. \n')).toBe(
      'Hello there. General Kenobi.'
    )
  })
})

describe('whisper model cache', () => {
  it('shares concurrent loads and retries after a failed one', async () => {
    const loader = vi
      .fn<(size: string) => Promise<WhisperModel>>()
      .mockRejectedValueOnce(new WhisperUnavailableError('missing model'))
      .mockImplementation(async () => fakeModel(async () => 'text'))
    const cache = createWhisperModelCache(loader)

    await expect(cache.load('base')).rejects.toThrow('missing model')
    expect(cache.has('base')).toBe(false)

    const [a, b] = await Promise.all([cache.load('base'), cache.load('base')])
    expect(a).toBe(b)
    expect(loader).toHaveBeenCalledTimes(2)
    expect(cache.has('base')).toBe(true)
  })
})

describe('transcribeSegment', () => {
  const logsDir = () => mkdtempSync(join(tmpdir(), 'slidescribe-whisper-'))

  it('records an unavailable transcriber with zero attempts', async () => {
    const store = createMemorySlideStore()
    const result = await transcribeSegment({
      wavPath: '/tmp/a.wav',
      modelSize: 'base',
      loadModel: async () => {
        throw new WhisperUnavailableError('whisper.cpp model not found: /models/ggml-base.bin')
      },
      recorder: store,
      logger: createSilentLogger(),
      logsDir: logsDir(),
      failureContext,
    })

    expect(result).toEqual({ text: '', outcome: 'unavailable' })
    const failures = await store.listFailures()
    expect(failures).toHaveLength(1)
    expect(failures[0]?.tool).toBe('transcriber')
    expect(failures[0]?.attempts).toBe(0)
    expect(failures[0]?.error).toBe('whisper.cpp model not found: /models/ggml-base.bin')
    expect(failures[0]?.details?.modelSize).toBe('base')
  })

  it('records a failed run with stderr cut to 4000 characters', async () => {
    const store = createMemorySlideStore()
    const stderr = 'e'.repeat(5000)
    const result = await transcribeSegment({
      wavPath: '/tmp/a.wav',
      modelSize: 'base',
      loadModel: async () =>
        fakeModel(async () => {
          throw new ProcessError('whisper.cpp exited with code 3', { exitCode: 3, stderr })
        }),
      recorder: store,
      logger: createSilentLogger(),
      logsDir: logsDir(),
      failureContext,
    })

    expect(result.outcome).toBe('failed')
    const [failure] = await store.listFailures('vid-1')
    expect(failure?.attempts).toBe(3)
    expect(failure?.error).toBe(`${'e'.repeat(4000)}...`)
  })

  it('reports empty output without a failure record', async () => {
    const store = createMemorySlideStore()
    const result = await transcribeSegment({
      wavPath: '/tmp/a.wav',
      modelSize: 'base',
      loadModel: async () => fakeModel(async () => '   '),
      recorder: store,
      logger: createSilentLogger(),
      logsDir: logsDir(),
      failureContext,
    })
    expect(result).toEqual({ text: '', outcome: 'empty' })
    expect(await store.listFailures()).toEqual([])
  })

  it('returns trimmed text', async () => {
    const result = await transcribeSegment({
      wavPath: '/tmp/a.wav',
      modelSize: 'base',
      loadModel: async () => fakeModel(async () => ' Caching slide. '),
      recorder: createMemorySlideStore(),
      logger: createSilentLogger(),
      logsDir: logsDir(),
      failureContext,
    })
    expect(result).toEqual({ text: 'Caching slide.', outcome: 'transcribed' })
  })
})

describe('whisper.cpp loader', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  const setup = () => {
    const dir = mkdtempSync(join(tmpdir(), 'slidescribe-whispercpp-'))
    const binary = join(dir, 'whisper-cli')
    writeFileSync(binary, '#!/bin/sh\n')
    chmodSync(binary, 0o755)
    const modelDir = join(dir, 'models')
    return { dir, binary, modelDir }
  }

  it('is unavailable without the binary', async () => {
    const load = createWhisperCppLoader({ binary: 'whisper-cli', modelDir: '/models', env: { PATH: '' } })
    await expect(load('base')).rejects.toBeInstanceOf(WhisperUnavailableError)
  })

  it('is unavailable without the model file', async () => {
    const { binary, modelDir } = setup()
    const load = createWhisperCppLoader({ binary, modelDir, env: {} })
    await expect(load('base')).rejects.toThrow(
      `whisper.cpp model not found: ${join(modelDir, 'ggml-base.bin')}`
    )
  })

  it('runs whisper.cpp on the CPU without timestamps', async () => {
    const { dir, binary } = setup()
    writeFileSync(join(dir, 'ggml-small.bin'), 'model')
    spawnMock.mockImplementation(() =>
      exitWith(new FakeProcess(), { code: 0, stdout: ' Hello.\n[BLANK_AUDIO]\n' })
    )

    const model = await createWhisperCppLoader({ binary, modelDir: dir, env: {}, threads: 2 })('small')
    const text = await model.transcribe('/tmp/segment.wav')

    expect(text).toBe('Hello.')
    expect(spawnMock).toHaveBeenCalledWith(
      binary,
      ['-m', join(dir, 'ggml-small.bin'), '-f', '/tmp/segment.wav', '-nt', '-np', '-ng', '-t', '2'],
      expect.anything()
    )
  })
})
