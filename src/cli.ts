import path from 'node:path'

import { Command, CommanderError } from 'commander'

import { loadSlidescribeConfig } from './config.js'
import { DAEMON_HOST, runDaemonServer } from './daemon/server.js'
import { describeError } from './errors.js'
import type { JobSnapshot, ProcessingEvent } from './jobs/types.js'
import { createAppLogging } from './logging/logger.js'
import { DEFAULT_PROCESSING_SETTINGS } from './processing/settings.js'
import { createRuntime, type Runtime } from './runtime.js'
import { resolvePackageVersion } from './version.js'

export type CliContext = {
  env: Record<string, string | undefined>
  cwd: string
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  /** Aborting cancels a running `process` job and stops the daemon. */
  signal?: AbortSignal
}

export const EXIT_OK = 0
export const EXIT_ERROR = 1
export const EXIT_CANCELLED = 130

const SETTING_FLAGS: ReadonlyArray<[flag: string, description: string]> = [
  ['--threshold-ssim <value>', 'SSIM score below which frames differ (0-1).'],
  ['--threshold-hist <value>', 'Histogram correlation below which frames differ (0-1).'],
  ['--frame-gap <frames>', 'Frames that must pass after a slide before a new change counts.'],
  ['--transition-limit <frames>', 'Frames past the frame gap a detected change waits before it is confirmed.'],
  ['--scale-percent <percent>', 'Processing resolution used for comparison (1-100).'],
  ['--target-resolution-percent <percent>', 'Resolution of saved slide images (1-100).'],
  ['--histogram-bins <count>', 'Histogram bins (2-256).'],
  ['--audio-retry-attempts <count>', 'Primary audio extraction attempts (1-10).'],
  ['--audio-skip-on-failure <bool>', 'Keep going when a segment has no audio (true/false).'],
  ['--summary-min-length <words>', 'Minimum summary length.'],
  ['--summary-max-length <words>', 'Maximum summary length.'],
  ['--min-slide-audio-seconds <seconds>', 'Shorter segments stay with the current slide.'],
  ['--whisper-model <size>', 'whisper.cpp model size (tiny, base, small, ...).'],
  ['--summary-model <provider/model>', 'Summary model, e.g. openai/gpt-5-mini.'],
  ['--progress-interval <frames>', 'Frames between progress events.'],
  ['--preview-interval <frames>', 'Frames between preview refreshes.'],
  ['--max-wav-files <count>', 'Segment WAV files kept per video.'],
]

function collectSettings(options: Record<string, unknown>): Record<string, unknown> {
  const settings: Record<string, unknown> = {}
  for (const key of Object.keys(DEFAULT_PROCESSING_SETTINGS)) {
    const value = options[key]
    if (typeof value === 'string') settings[key] = value
  }
  return settings
}

export function formatEventLine(event: ProcessingEvent): string | null {
  switch (event.type) {
    case 'started':
      return `Processing ${event.totalFrames} frames at ${event.fps.toFixed(2)} fps`
    case 'progress':
      return `Processed ${event.framesProcessed} / ${event.totalFrames} frames (${event.percent.toFixed(1)}%)`
    case 'slide':
      return `Slide at ${event.timestamp.toFixed(2)}s -> ${event.imagePath}`
    case 'status':
      return event.message
    case 'error':
      return `Error: ${event.message}`
    case 'cancelled':
      return `Cancelled at ${event.percent.toFixed(1)}%`
    case 'complete':
      return 'Done'
    default:
      return null
  }
}

async function printResult({
  runtime,
  job,
  json,
  stdout,
}: {
  runtime: Runtime
  job: JobSnapshot
  json: boolean
  stdout: NodeJS.WritableStream
}) {
  const slides = job.videoId ? await runtime.store.listSlides(job.videoId) : []
  const extracts = job.videoId ? await runtime.store.listTextExtracts(job.videoId) : []

  if (json) {
    stdout.write(`${JSON.stringify({ job, slides, extracts }, null, 2)}\n`)
    return
  }

  for (const slide of slides) {
    stdout.write(`#${slide.orderIndex} ${slide.timestamp.toFixed(2)}s ${slide.imagePath}\n`)
    for (const extract of extracts.filter((entry) => entry.slideId === slide.id)) {
      stdout.write(`  ${extract.suggestedText}\n`)
    }
  }
  stdout.write(`${job.status}: ${slides.length} slides, ${job.framesProcessed} frames\n`)
}

async function runProcess(
  ctx: CliContext,
  video: string,
  options: Record<string, unknown>
): Promise<number> {
  const { config } = loadSlidescribeConfig({ env: ctx.env })
  const logging = createAppLogging({ env: ctx.env, config })
  const runtime = createRuntime({
    env: ctx.env,
    config,
    cwd: ctx.cwd,
    logger: logging.logger,
    outputOverride: typeof options.out === 'string' ? options.out : null,
  })
  const settings = runtime.resolveSettings(collectSettings(options))
  const json = options.json === true

  const submitted = runtime.registry.submit({
    videoPath: path.resolve(ctx.cwd, video),
    settings,
  })
  const unsubscribe = runtime.registry.subscribe(submitted.id, (event) => {
    const line = formatEventLine(event)
    if (line) ctx.stderr.write(`${line}\n`)
  })
  const onAbort = () => {
    runtime.registry.cancel(submitted.id)
  }
  if (ctx.signal?.aborted) onAbort()
  ctx.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const job = await runtime.registry.wait(submitted.id)
    if (!job) throw new Error(`Job ${submitted.id} disappeared`)
    await printResult({ runtime, job, json, stdout: ctx.stdout })
    if (job.status === 'completed') return EXIT_OK
    if (job.status === 'cancelled') return EXIT_CANCELLED
    return EXIT_ERROR
  } finally {
    unsubscribe?.()
    ctx.signal?.removeEventListener('abort', onAbort)
    await logging.flush()
  }
}

async function runDaemon(ctx: CliContext, options: Record<string, unknown>): Promise<number> {
  const { config } = loadSlidescribeConfig({ env: ctx.env })
  const logging = createAppLogging({ env: ctx.env, config })
  const runtime = createRuntime({ env: ctx.env, config, cwd: ctx.cwd, logger: logging.logger })
  const portRaw = typeof options.port === 'string' ? Number(options.port) : null
  if (portRaw !== null && (!Number.isInteger(portRaw) || portRaw < 0 || portRaw > 65535)) {
    throw new Error(`Unsupported --port: ${String(options.port)}`)
  }
  const host = typeof options.host === 'string' && options.host.trim() ? options.host : DAEMON_HOST

  try {
    await runDaemonServer({
      ctx: {
        registry: runtime.registry,
        resolveSettings: runtime.resolveSettings,
        failures: runtime.store,
        logger: logging.logger.getSubLogger({ name: 'daemon' }),
        token: config?.daemon?.token ?? null,
        cwd: ctx.cwd,
      },
      config,
      host,
      ...(portRaw !== null ? { port: portRaw } : {}),
      ...(ctx.signal ? { signal: ctx.signal } : {}),
      onListening: (port) => {
        ctx.stderr.write(`slidescribe daemon listening on http://${host}:${port}\n`)
      },
    })
  } finally {
    await logging.flush()
  }
  return EXIT_OK
}

export function buildProgram(ctx: CliContext, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name('slidescribe')
    .description('Turn lecture videos into slide images with transcripts and summaries.')
    .version(resolvePackageVersion())

  const processCommand = program
    .command('process')
    .description('Detect slides in a video and attach a transcript and summary to each.')
    .argument('<video>', 'Path to a local video file')
    .option('--out <dir>', 'Output root for slide images and document.json.')
    .option('--json', 'Print the final job and document as JSON.', false)
  for (const [flag, description] of SETTING_FLAGS) {
    processCommand.option(flag, description)
  }
  processCommand.action(async (video: string, options: Record<string, unknown>) => {
    setExitCode(await runProcess(ctx, video, options))
  })

  program
    .command('daemon')
    .description('Serve the job API over HTTP.')
    .option('--port <port>', 'Port to listen on (default: config daemon.port or 8787).')
    .option('--host <host>', `Host to bind (default: ${DAEMON_HOST}).`)
    .action(async (options: Record<string, unknown>) => {
      setExitCode(await runDaemon(ctx, options))
    })

  return program
}

export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  let exitCode = EXIT_OK
  const program = buildProgram(ctx, (code) => {
    exitCode = code
  })
  const output = {
    writeOut(str: string) {
      ctx.stdout.write(str)
    },
    writeErr(str: string) {
      ctx.stderr.write(str)
    },
  }
  for (const command of [program, ...program.commands]) {
    command.configureOutput(output).exitOverride()
  }

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        return EXIT_OK
      }
      return error.exitCode || EXIT_ERROR
    }
    ctx.stderr.write(`Error: ${describeError(error)}\n`)
    return EXIT_ERROR
  }
  return exitCode
}
