import { mkdtempSync, readFileSync, statSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import { extractAudioSegment } from '../src/audio/extract.js'
import type { FailureInput, FailureRecord } from '../src/failures/recorder.js'
import { createSilentLogger } from '../src/logging/logger.js'

import { exitWith, FakeProcess } from './helpers/process.js'

const createRecorder = () => {
  const records: FailureRecord[] = []
  return {
    records,
    recordFailure: async (input: FailureInput) => {
      const record: FailureRecord = {
        ...input,
        id: `f${records.length + 1}`,
        createdAt: '2026-01-01T00:00:00.000Z',
      }
      records.push(record)
      return record
    },
  }
}

const setup = () => {
  const root = mkdtempSync(join(tmpdir(), 'slidescribe-audio-'))
  return {
    root,
    outputPath: join(root, 'audio', 'vid-1', 'talk-0-50.wav'),
    logsDir: join(root, 'failures'),
  }
}

describe('extractAudioSegment', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('records one failure per stage when primary and fallback both fail', async () => {
    const { outputPath, logsDir } = setup()
    const longStderr = 'x'.repeat(2500)
    spawnMock.mockImplementation((_command: string, args: string[]) =>
      args.includes('s16le')
        ? exitWith(new FakeProcess(), { code: 1, stderr: 'decode failed\n' })
        : exitWith(new FakeProcess(), { code: 1, stderr: `${longStderr}\n` })
    )
    const recorder = createRecorder()
    const sleeps: number[] = []
    const messages: string[] = []

    const result = await extractAudioSegment(
      {
        videoPath: '/videos/talk.mp4',
        videoId: 'vid-1',
        slideId: 'slide-1',
        startFrame: 0,
        endFrame: 50,
        fps: 25,
        outputPath,
      },
      {
        ffmpegPath: 'ffmpeg',
        logsDir,
        recorder,
        logger: createSilentLogger(),
        maxAttempts: 3,
        sleep: async (ms) => {
          sleeps.push(ms)
        },
        onStatus: ({ message }) => messages.push(message),
      }
    )

    expect(spawnMock).toHaveBeenCalledTimes(4)
    expect(sleeps).toEqual([600, 1200, 1800])
    expect(result.ok).toBe(false)
    expect(result.attempts).toBe(4)
    expect(messages).toEqual([
      'Audio extraction attempt 1/3 failed (segment 0→50)',
      'Audio extraction attempt 2/3 failed (segment 0→50)',
      'Audio extraction attempt 3/3 failed (segment 0→50)',
      'Falling back to full-track audio decode (segment 0→50)',
    ])

    expect(recorder.records.map((record) => [record.tool, record.attempts])).toEqual([
      ['primary-transcoder', 3],
      ['fallback-decoder', 1],
    ])
    const [primary, fallback] = recorder.records
    expect(primary?.error).toBe(`${'x'.repeat(2000)}...(truncated)`)
    expect(primary?.slideId).toBe('slide-1')
    expect(fallback?.error).toBe('decode failed\n')

    const logPath = primary?.details?.logPath
    expect(typeof logPath).toBe('string')
    if (typeof logPath === 'string') {
      expect(logPath.startsWith(join(logsDir, 'vid-1_primary-transcoder_'))).toBe(true)
      expect(readFileSync(logPath, 'utf8')).toBe(`${longStderr}\n`)
    }
    expect(readFileSync(join(logsDir, '.gitignore'), 'utf8')).toBe('*\n')
  })

  it('passes the segment window to the primary transcoder', async () => {
    const { outputPath, logsDir } = setup()
    spawnMock.mockImplementation(() => exitWith(new FakeProcess(), { code: 0 }))

    const result = await extractAudioSegment(
      { videoPath: '/videos/talk.mp4', videoId: 'vid-1', startFrame: 50, endFrame: 125, fps: 25, outputPath },
      { ffmpegPath: '/opt/ffmpeg', logsDir, recorder: createRecorder(), logger: createSilentLogger() }
    )

    expect(result).toEqual({ ok: true, wavPath: outputPath, source: 'primary-transcoder', attempts: 1 })
    const [command, args] = spawnMock.mock.calls[0] ?? []
    expect(command).toBe('/opt/ffmpeg')
    expect(args).toEqual(
      expect.arrayContaining(['-ss', '2.000', '-t', '3.000', '-i', '/videos/talk.mp4', outputPath])
    )
  })

  it('retries the primary transcoder with linear backoff', async () => {
    const { outputPath, logsDir } = setup()
    spawnMock
      .mockImplementationOnce(() => exitWith(new FakeProcess(), { code: 1, stderr: 'busy\n' }))
      .mockImplementationOnce(() => exitWith(new FakeProcess(), { code: 0 }))
    const recorder = createRecorder()
    const sleeps: number[] = []

    const result = await extractAudioSegment(
      { videoPath: '/videos/talk.mp4', videoId: 'vid-1', startFrame: 0, endFrame: 50, fps: 25, outputPath },
      {
        ffmpegPath: 'ffmpeg',
        logsDir,
        recorder,
        logger: createSilentLogger(),
        sleep: async (ms) => {
          sleeps.push(ms)
        },
      }
    )

    expect(result.ok && result.attempts).toBe(2)
    expect(sleeps).toEqual([600])
    expect(recorder.records).toEqual([])
  })

  it('cuts the window out of a full decode when the primary keeps failing', async () => {
    const { outputPath, logsDir } = setup()
    const twoSeconds = Buffer.alloc(2 * 16_000 * 2, 1)
    spawnMock.mockImplementation((_command: string, args: string[]) =>
      args.includes('s16le')
        ? exitWith(new FakeProcess(), { code: 0, stdout: twoSeconds })
        : exitWith(new FakeProcess(), { code: 1, stderr: 'no\n' })
    )
    const recorder = createRecorder()

    const result = await extractAudioSegment(
      { videoPath: '/videos/talk.mp4', videoId: 'vid-1', startFrame: 0, endFrame: 25, fps: 25, outputPath },
      {
        ffmpegPath: 'ffmpeg',
        logsDir,
        recorder,
        logger: createSilentLogger(),
        maxAttempts: 1,
        sleep: async () => {},
      }
    )

    expect(result).toEqual({ ok: true, wavPath: outputPath, source: 'fallback-decoder', attempts: 2 })
    expect(statSync(outputPath).size).toBe(44 + 32_000)
    expect(recorder.records).toEqual([])
  })

  it('reuses an existing WAV without spawning anything', async () => {
    const { root, logsDir } = setup()
    const outputPath = join(root, 'existing.wav')
    writeFileSync(outputPath, Buffer.alloc(100))

    const result = await extractAudioSegment(
      { videoPath: '/videos/talk.mp4', videoId: null, startFrame: 0, endFrame: 25, fps: 25, outputPath },
      { ffmpegPath: 'ffmpeg', logsDir, recorder: createRecorder(), logger: createSilentLogger() }
    )

    expect(result).toEqual({ ok: true, wavPath: outputPath, source: 'reused', attempts: 0 })
    expect(spawnMock).not.toHaveBeenCalled()
  })
})
