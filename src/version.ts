import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

let cached: string | null = null

/** Version from package.json next to src/ or dist/. */
export function resolvePackageVersion(): string {
  if (cached) return cached
  try {
    const raw = readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf8')
    const parsed: unknown = JSON.parse(raw)
    const version =
      parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string'
        ? parsed.version
        : null
    cached = version ?? '0.0.0'
  } catch {
    cached = '0.0.0'
  }
  return cached
}
