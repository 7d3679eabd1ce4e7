import { promises as fs } from 'node:fs'
import http from 'node:http'
import path from 'node:path'

import type { SlidescribeConfig } from '../config.js'
import { describeError } from '../errors.js'
import type { JobRegistry } from '../jobs/registry.js'
import { isTerminalStatus, type JobStatus } from '../jobs/types.js'
import type { AppLogger } from '../logging/logger.js'
import type { ProcessingSettings } from '../processing/settings.js'
import type { SlideStore } from '../store/types.js'
import { resolvePackageVersion } from '../version.js'

import { encodeSseEvent } from './sse.js'

export const DAEMON_HOST = '127.0.0.1'
export const DAEMON_PORT_DEFAULT = 8787

const MAX_BODY_BYTES = 64 * 1024
const SSE_KEEPALIVE_MS = 15_000
const JOB_STATUSES: readonly JobStatus[] = [
  'queued',
  'starting',
  'running',
  'cancelling',
  'completed',
  'error',
  'cancelled',
]

export type DaemonContext = {
  registry: JobRegistry
  resolveSettings: (input?: Record<string, unknown>) => ProcessingSettings
  failures: Pick<SlideStore, 'listFailures'>
  logger: AppLogger
  /** Bearer token required on /v1/ routes when set. */
  token: string | null
  cwd: string
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message)
    this.name = 'HttpError'
  }
}

function json(
  res: http.ServerResponse,
  status: number,
  payload: unknown,
  headers?: Record<string, string>
) {
  const body = `${JSON.stringify(payload)}\n`
  res.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'content-length': Buffer.byteLength(body).toString(),
    'cache-control': 'no-store',
    ...headers,
  })
  res.end(body)
}

function resolveOriginHeader(req: http.IncomingMessage): string | null {
  const origin = req.headers.origin
  return typeof origin === 'string' && origin.trim() ? origin : null
}

function corsHeaders(origin: string | null): Record<string, string> {
  if (!origin) return {}
  return {
    'access-control-allow-origin': origin,
    'access-control-allow-headers': 'authorization, content-type',
    'access-control-allow-methods': 'GET,POST,OPTIONS',
    'access-control-max-age': '600',
    vary: 'Origin',
  }
}

function readBearerToken(req: http.IncomingMessage): string | null {
  const header = req.headers.authorization
  if (typeof header !== 'string') return null
  const m = header.match(/^Bearer\s+(.+)\s*$/i)
  return m?.[1]?.trim() || null
}

async function readJsonBody(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = []
  let total = 0
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    total += buf.byteLength
    if (total > maxBytes) throw new HttpError(413, `Body too large (>${maxBytes} bytes)`)
    chunks.push(buf)
  }
  const text = Buffer.concat(chunks).toString('utf8').trim()
  if (!text) return {}
  try {
    return JSON.parse(text)
  } catch {
    throw new HttpError(400, 'Invalid JSON body')
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

function parseStatusFilter(raw: string | null): JobStatus | undefined {
  if (!raw) return undefined
  const match = JOB_STATUSES.find((status) => status === raw)
  if (!match) throw new HttpError(400, `Unknown status filter: ${raw}`)
  return match
}

async function createJob(ctx: DaemonContext, body: unknown) {
  if (!isRecord(body)) throw new HttpError(400, 'Expected a JSON object')
  const videoPathRaw = typeof body.videoPath === 'string' ? body.videoPath.trim() : ''
  if (!videoPathRaw) throw new HttpError(400, 'videoPath is required')
  const videoPath = path.resolve(ctx.cwd, videoPathRaw)
  const stat = await fs.stat(videoPath).catch(() => null)
  if (!stat?.isFile()) throw new HttpError(400, `Video not found: ${videoPath}`)

  const settingsInput = body.settings ?? {}
  if (!isRecord(settingsInput)) throw new HttpError(400, 'settings must be an object')
  let settings: ProcessingSettings
  try {
    settings = ctx.resolveSettings(settingsInput)
  } catch (error) {
    throw new HttpError(400, describeError(error))
  }
  return ctx.registry.submit({ videoPath, settings })
}

function streamJobEvents(
  ctx: DaemonContext,
  id: string,
  res: http.ServerResponse,
  cors: Record<string, string>
) {
  const snapshot = ctx.registry.get(id)
  if (!snapshot) {
    json(res, 404, { ok: false, error: 'not found' }, cors)
    return
  }

  res.writeHead(200, {
    ...cors,
    'content-type': 'text/event-stream; charset=utf-8',
    'cache-control': 'no-cache, no-transform',
    connection: 'keep-alive',
  })
  res.write(encodeSseEvent({ event: 'snapshot', data: snapshot }))
  if (isTerminalStatus(snapshot.status)) {
    res.end()
    return
  }

  const keepalive = setInterval(() => {
    res.write(`: keepalive ${Date.now()}\n\n`)
  }, SSE_KEEPALIVE_MS)
  keepalive.unref()

  let unsubscribe: (() => void) | null = null
  const stop = () => {
    clearInterval(keepalive)
    unsubscribe?.()
    unsubscribe = null
  }
  unsubscribe = ctx.registry.subscribe(id, (event, job) => {
    res.write(encodeSseEvent({ event: event.type, data: event }))
    if (isTerminalStatus(job.status)) {
      stop()
      res.end()
    }
  })
  res.on('close', stop)
}

async function route(
  ctx: DaemonContext,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  cors: Record<string, string>
) {
  const url = new URL(req.url ?? '/', `http://${DAEMON_HOST}`)
  const pathname = url.pathname.replace(/\/+$/, '') || '/'

  if (req.method === 'GET' && pathname === '/health') {
    json(res, 200, { ok: true, pid: process.pid, version: resolvePackageVersion() }, cors)
    return
  }

  if (pathname.startsWith('/v1/') && ctx.token && readBearerToken(req) !== ctx.token) {
    json(res, 401, { ok: false, error: 'unauthorized' }, cors)
    return
  }

  if (pathname === '/v1/jobs') {
    if (req.method === 'POST') {
      const job = await createJob(ctx, await readJsonBody(req, MAX_BODY_BYTES))
      json(res, 202, { ok: true, id: job.id, job }, cors)
      return
    }
    if (req.method === 'GET') {
      const status = parseStatusFilter(url.searchParams.get('status'))
      json(res, 200, { ok: true, jobs: ctx.registry.list({ status }) }, cors)
      return
    }
  }

  if (req.method === 'GET' && pathname === '/v1/failures') {
    const videoId = url.searchParams.get('videoId')?.trim() || undefined
    json(res, 200, { ok: true, failures: await ctx.failures.listFailures(videoId) }, cors)
    return
  }

  const jobMatch = pathname.match(/^\/v1\/jobs\/([^/]+)(?:\/(logs|events|cancel))?$/)
  if (jobMatch) {
    const id = decodeURIComponent(jobMatch[1] ?? '')
    const action = jobMatch[2] ?? null

    if (req.method === 'GET' && action === null) {
      const job = ctx.registry.get(id)
      if (!job) {
        json(res, 404, { ok: false, error: 'not found' }, cors)
        return
      }
      json(res, 200, { ok: true, job }, cors)
      return
    }
    if (req.method === 'GET' && action === 'logs') {
      const nRaw = Number(url.searchParams.get('n') ?? '50')
      const n = Number.isFinite(nRaw) ? Math.min(Math.max(0, Math.trunc(nRaw)), 1000) : 50
      const logs = ctx.registry.logs(id, n)
      if (!logs) {
        json(res, 404, { ok: false, error: 'not found' }, cors)
        return
      }
      json(res, 200, { ok: true, logs }, cors)
      return
    }
    if (req.method === 'GET' && action === 'events') {
      streamJobEvents(ctx, id, res, cors)
      return
    }
    if (req.method === 'POST' && action === 'cancel') {
      const result = ctx.registry.cancel(id)
      if (result.ok) {
        json(res, 200, { ok: true, status: result.status }, cors)
      } else if (result.reason === 'not-found') {
        json(res, 404, { ok: false, error: 'not found' }, cors)
      } else {
        json(res, 409, { ok: false, error: 'job already finished' }, cors)
      }
      return
    }
  }

  json(res, 404, { ok: false, error: 'not found' }, cors)
}

export function createDaemonServer(ctx: DaemonContext): http.Server {
  return http.createServer((req, res) => {
    const cors = corsHeaders(resolveOriginHeader(req))
    if (req.method === 'OPTIONS') {
      res.writeHead(204, cors)
      res.end()
      return
    }
    route(ctx, req, res, cors).catch((error: unknown) => {
      const status = error instanceof HttpError ? error.status : 500
      if (status === 500) {
        ctx.logger.error('Request failed', { method: req.method, url: req.url, error })
      }
      if (!res.headersSent) {
        json(res, status, { ok: false, error: describeError(error) }, cors)
        return
      }
      res.end()
    })
  })
}

export async function runDaemonServer({
  ctx,
  config,
  host = DAEMON_HOST,
  port = config?.daemon?.port ?? DAEMON_PORT_DEFAULT,
  signal,
  onListening,
}: {
  ctx: DaemonContext
  config: SlidescribeConfig | null
  host?: string
  port?: number
  signal?: AbortSignal
  onListening?: ((port: number) => void) | null
}): Promise<void> {
  const server = createDaemonServer(ctx)

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, host, () => {
      const address = server.address()
      const actualPort =
        address && typeof address === 'object' && typeof address.port === 'number'
          ? address.port
          : port
      ctx.logger.info('Daemon listening', { host, port: actualPort })
      onListening?.(actualPort)
      resolve()
    })
  })

  await new Promise<void>((resolve) => {
    let stopped = false
    const onStop = () => {
      if (stopped) return
      stopped = true
      for (const job of ctx.registry.list()) {
        if (!isTerminalStatus(job.status)) ctx.registry.cancel(job.id)
      }
      server.closeAllConnections()
      server.close(() => resolve())
    }
    process.once('SIGTERM', onStop)
    process.once('SIGINT', onStop)
    if (signal) {
      if (signal.aborted) {
        onStop()
      } else {
        signal.addEventListener('abort', onStop, { once: true })
      }
    }
  })
}
