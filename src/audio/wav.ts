export const SPEECH_SAMPLE_RATE = 16_000

/** Wrap little-endian PCM samples in a canonical 44-byte RIFF/WAVE header. */
export function encodeWav(
  pcm: Uint8Array,
  { sampleRate = SPEECH_SAMPLE_RATE, channels = 1, bitsPerSample = 16 } = {}
): Buffer {
  const blockAlign = (channels * bitsPerSample) / 8
  const header = Buffer.alloc(44)
  header.write('RIFF', 0, 'ascii')
  header.writeUInt32LE(36 + pcm.length, 4)
  header.write('WAVE', 8, 'ascii')
  header.write('fmt ', 12, 'ascii')
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20)
  header.writeUInt16LE(channels, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(bitsPerSample, 34)
  header.write('data', 36, 'ascii')
  header.writeUInt32LE(pcm.length, 40)
  return Buffer.concat([header, pcm])
}

/**
 * Cut [startSeconds, endSeconds) out of mono s16le PCM after clamping both ends to the clip.
 * Throws when nothing is left.
 */
export function slicePcm(
  pcm: Uint8Array,
  startSeconds: number,
  endSeconds: number,
  sampleRate = SPEECH_SAMPLE_RATE
): Uint8Array {
  const bytesPerSample = 2
  const clipDuration = Math.floor(pcm.length / bytesPerSample) / sampleRate
  const start = Math.min(Math.max(startSeconds, 0), clipDuration)
  const end = Math.min(Math.max(endSeconds, 0), clipDuration)
  if (end <= start) {
    throw new Error(
      `Invalid audio range: start=${start.toFixed(3)}s end=${end.toFixed(3)}s (clip ${clipDuration.toFixed(3)}s)`
    )
  }
  const from = Math.round(start * sampleRate) * bytesPerSample
  const to = Math.round(end * sampleRate) * bytesPerSample
  return pcm.subarray(from, Math.min(to, pcm.length))
}
