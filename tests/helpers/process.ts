import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'

/** Minimal stand-in for a spawned child with piped stdio. */
export class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough()
  readonly stderr = new PassThrough()
  readonly stdin = new PassThrough()
  readonly stdinChunks: Buffer[] = []
  killed = false
  exitCode: number | null = null

  constructor() {
    super()
    this.stdin.on('data', (chunk: Buffer) => {
      this.stdinChunks.push(chunk)
    })
  }

  kill() {
    this.killed = true
    return true
  }
}

/** Exit on a later tick, after stdout and stderr have drained. */
export function exitWith(
  proc: FakeProcess,
  { code, stdout, stderr }: { code: number; stdout?: Buffer | string; stderr?: string }
): FakeProcess {
  proc.stderr.on('end', () =>
    setImmediate(() => {
      proc.exitCode = code
      proc.emit('close', code, null)
    })
  )
  process.nextTick(() => {
    if (stdout) proc.stdout.write(stdout)
    proc.stdout.end()
    proc.stderr.end(stderr ?? '')
  })
  return proc
}
