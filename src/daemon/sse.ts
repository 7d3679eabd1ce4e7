export type SseMessage = {
  event: string
  data: unknown
  id?: string
}

export function encodeSseEvent({ event, data, id }: SseMessage): string {
  const lines: string[] = []
  if (id) lines.push(`id: ${id}`)
  lines.push(`event: ${event}`)
  for (const line of JSON.stringify(data).split('\n')) {
    lines.push(`data: ${line}`)
  }
  return `${lines.join('\n')}\n\n`
}
