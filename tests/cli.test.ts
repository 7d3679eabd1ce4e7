import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PassThrough } from 'node:stream'
import { describe, expect, it } from 'vitest'

import { buildProgram, type CliContext, formatEventLine, runCli } from '../src/cli.js'

const collect = () => {
  const stream = new PassThrough()
  let text = ''
  stream.setEncoding('utf8')
  stream.on('data', (chunk: string) => {
    text += chunk
  })
  return { stream, read: () => text }
}

const createContext = () => {
  const home = mkdtempSync(join(tmpdir(), 'slidescribe-cli-'))
  const stdout = collect()
  const stderr = collect()
  const ctx: CliContext = {
    env: { HOME: home },
    cwd: home,
    stdout: stdout.stream,
    stderr: stderr.stream,
  }
  return { ctx, home, stdout, stderr }
}

describe('formatEventLine', () => {
  it('renders user-facing events', () => {
    expect(formatEventLine({ type: 'started', totalFrames: 250, fps: 25, videoId: 'v' })).toBe(
      'Processing 250 frames at 25.00 fps'
    )
    expect(
      formatEventLine({ type: 'progress', framesProcessed: 25, totalFrames: 250, percent: 10 })
    ).toBe('Processed 25 / 250 frames (10.0%)')
    expect(
      formatEventLine({
        type: 'slide',
        frame: 50,
        timestamp: 2,
        slideId: 's',
        imagePath: '/out/slide.png',
        preview: null,
      })
    ).toBe('Slide at 2.00s -> /out/slide.png')
    expect(formatEventLine({ type: 'cancelled', percent: 30 })).toBe('Cancelled at 30.0%')
    expect(formatEventLine({ type: 'gpu', diagnostics: {} })).toBeNull()
  })
})

describe('runCli', () => {
  it('prints the package version', async () => {
    const { ctx, stdout } = createContext()
    expect(await runCli(['--version'], ctx)).toBe(0)
    expect(stdout.read()).toBe('0.1.0\n')
  })

  it('describes the transition limit as frames waited past the frame gap', () => {
    const { ctx } = createContext()
    const processCommand = buildProgram(ctx, () => {}).commands.find((command) => command.name() === 'process')
    const option = processCommand?.options.find((candidate) => candidate.long === '--transition-limit')
    expect(option?.description).toBe('Frames past the frame gap a detected change waits before it is confirmed.')
  })

  it('rejects unknown options with a non-zero exit', async () => {
    const { ctx, stderr } = createContext()
    expect(await runCli(['process', 'talk.mp4', '--nope'], ctx)).toBe(1)
    expect(stderr.read()).toBe("error: unknown option '--nope'\n")
  })

  it('rejects invalid settings before submitting a job', async () => {
    const { ctx, stderr } = createContext()
    expect(await runCli(['process', 'talk.mp4', '--frame-gap', 'soon'], ctx)).toBe(1)
    expect(stderr.read()).toBe('Error: Unsupported frame gap: soon\n')
  })

  it('reports a missing video as a failed job', async () => {
    const { ctx, home, stdout, stderr } = createContext()
    expect(await runCli(['process', 'missing.mp4'], ctx)).toBe(1)
    expect(stdout.read()).toBe('error: 0 slides, 0 frames\n')
    expect(stderr.read().split('\n')).toContain(
      `Error: Video file not found: ${join(home, 'missing.mp4')}`
    )
  })
})
