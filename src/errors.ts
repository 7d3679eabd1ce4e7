export class VideoSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'VideoSourceError'
  }
}

export class AudioExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AudioExtractionError'
  }
}

export class WhisperUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'WhisperUnavailableError'
  }
}

export class ProcessError extends Error {
  readonly exitCode: number | null
  readonly stderr: string

  constructor(message: string, { exitCode, stderr }: { exitCode: number | null; stderr: string }) {
    super(message)
    this.name = 'ProcessError'
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/** Tool diagnostics for failure records: captured stderr when available, else the message. */
export function diagnosticText(error: unknown): string {
  if (error instanceof ProcessError && error.stderr.trim()) return error.stderr
  return describeError(error)
}
