import { spawn } from 'node:child_process'
import { accessSync, constants as fsConstants } from 'node:fs'
import path from 'node:path'

import { ProcessError } from '../errors.js'

const MAX_STDERR_CHARS = 64 * 1024

export type ToolResult = {
  stdout: Buffer
  stderr: string
}

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  if (!binary) return null
  if (path.isAbsolute(binary)) {
    return isExecutable(binary) ? binary : null
  }
  const pathEnv = env.PATH ?? ''
  for (const entry of pathEnv.split(path.delimiter)) {
    if (!entry) continue
    const candidate = path.join(entry, binary)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

/**
 * Spawn a tool, collect stdout as bytes and stderr as text, and reject with a ProcessError
 * on a non-zero exit. There is no timeout unless one is passed.
 */
export async function runTool({
  command,
  args,
  errorLabel,
  input,
  timeoutMs,
  onStderrLine,
}: {
  command: string
  args: string[]
  errorLabel: string
  input?: Buffer | Uint8Array
  timeoutMs?: number
  onStderrLine?: (line: string) => void
}): Promise<ToolResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: [input ? 'pipe' : 'ignore', 'pipe', 'pipe'] })
    const chunks: Buffer[] = []
    let stderr = ''
    let stderrBuffer = ''
    let stdinError: Error | null = null
    let settled = false
    let timeout: NodeJS.Timeout | null = null

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      if (timeout) clearTimeout(timeout)
      fn()
    }

    const appendStderr = (line: string) => {
      onStderrLine?.(line)
      if (stderr.length < MAX_STDERR_CHARS) {
        stderr += line.endsWith('\n') ? line : `${line}\n`
      }
    }

    if (timeoutMs && timeoutMs > 0) {
      timeout = setTimeout(() => {
        proc.kill('SIGKILL')
        settle(() => reject(new ProcessError(`${errorLabel} timed out`, { exitCode: null, stderr })))
      }, timeoutMs)
    }

    if (proc.stdout) {
      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderrBuffer += chunk
        const lines = stderrBuffer.split(/\r?\n/)
        stderrBuffer = lines.pop() ?? ''
        for (const line of lines) {
          if (line) appendStderr(line)
        }
      })
    }
    if (input && proc.stdin) {
      proc.stdin.on('error', (error) => {
        stdinError = error
      })
      proc.stdin.end(input)
    }

    proc.on('error', (error) => {
      settle(() => reject(error))
    })

    proc.on('close', (code) => {
      if (stderrBuffer) {
        appendStderr(stderrBuffer)
        stderrBuffer = ''
      }
      settle(() => {
        if (code === 0) {
          resolve({ stdout: Buffer.concat(chunks), stderr })
          return
        }
        const detail = stderr.trim() || stdinError?.message || ''
        const suffix = detail ? `: ${detail.slice(-2000)}` : ''
        reject(
          new ProcessError(`${errorLabel} exited with code ${code}${suffix}`, {
            exitCode: code,
            stderr,
          })
        )
      })
    })
  })
}
