import { existsSync, mkdtempSync, utimesSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { encodeWav, slicePcm } from '../src/audio/wav.js'
import { pruneWavFolder, segmentWavPath } from '../src/audio/workspace.js'

describe('audio working area', () => {
  it('builds per-video segment paths', () => {
    expect(
      segmentWavPath({
        audioRoot: '/data/audio',
        videoId: 'vid-1',
        videoPath: '/videos/My Talk.mp4',
        startFrame: 0,
        endFrame: 50,
      })
    ).toBe(join('/data/audio', 'vid-1', 'My_Talk-0-50.wav'))
    expect(
      segmentWavPath({
        audioRoot: '/data/audio',
        videoId: null,
        videoPath: '/videos/talk.mp4',
        startFrame: 10,
        endFrame: 20,
      })
    ).toBe(join('/data/audio', 'novid', 'talk-10-20.wav'))
  })

  it('prunes the oldest WAVs beyond the cap', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'slidescribe-wavs-'))
    const names = ['a.wav', 'b.wav', 'c.wav']
    names.forEach((name, index) => {
      const filePath = join(dir, name)
      writeFileSync(filePath, 'x')
      const seconds = 1_700_000_000 + index * 60
      utimesSync(filePath, seconds, seconds)
    })
    writeFileSync(join(dir, 'notes.txt'), 'keep')

    const removed = await pruneWavFolder(dir, 2)

    expect(removed).toEqual([join(dir, 'a.wav')])
    expect(existsSync(join(dir, 'b.wav'))).toBe(true)
    expect(existsSync(join(dir, 'notes.txt'))).toBe(true)
  })

  it('treats a missing folder as empty', async () => {
    const dir = join(tmpdir(), 'slidescribe-missing-folder', 'nope')
    expect(await pruneWavFolder(dir, 1)).toEqual([])
  })
})

describe('wav helpers', () => {
  it('writes a 44-byte header', () => {
    const wav = encodeWav(new Uint8Array(8))
    expect(wav.length).toBe(52)
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF')
    expect(wav.readUInt32LE(4)).toBe(44)
    expect(wav.readUInt32LE(24)).toBe(16_000)
    expect(wav.readUInt32LE(28)).toBe(32_000)
    expect(wav.readUInt32LE(40)).toBe(8)
  })

  it('slices a window out of mono PCM', () => {
    const oneSecond = new Uint8Array(32_000)
    expect(slicePcm(oneSecond, 0.25, 0.5).length).toBe(8_000)
    expect(slicePcm(oneSecond, 0.5, 4).length).toBe(16_000)
  })

  it('rejects a window past the end of the clip', () => {
    expect(() => slicePcm(new Uint8Array(32_000), 2, 3)).toThrow(
      'Invalid audio range: start=1.000s end=1.000s (clip 1.000s)'
    )
  })
})
