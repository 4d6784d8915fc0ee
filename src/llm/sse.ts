import { bestEffort } from '../log/safe.js'

import { CancelledError } from './errors.js'

export type SseReadStats = {
  /** Events that decoded as JSON and reached `onEvent`. */
  events: number
  malformed: number
  sawDone: boolean
}

/**
 * Reads `data:` events off a server-sent event body. Multi-line data fields
 * are joined per event; comment lines are ignored. Reading stops at
 * `data: [DONE]` or at the end of the body. Events that are not JSON are
 * counted and skipped.
 */
export const readSseEvents = async (
  body: ReadableStream<Uint8Array>,
  onEvent: (event: unknown) => void,
  options?: { signal?: AbortSignal; logPath?: string },
): Promise<SseReadStats> => {
  const reader = body.getReader()
  const decoder = new TextDecoder('utf-8')
  const stats: SseReadStats = { events: 0, malformed: 0, sawDone: false }
  let buffer = ''
  let dataLines: string[] = []

  const flushEvent = (): boolean => {
    if (dataLines.length === 0) return false
    const payloadText = dataLines.join('\n').trim()
    dataLines = []
    if (!payloadText) return false
    if (payloadText === '[DONE]') return true
    let parsed: unknown
    try {
      parsed = JSON.parse(payloadText)
    } catch {
      stats.malformed += 1
      return false
    }
    stats.events += 1
    onEvent(parsed)
    return false
  }

  const release = () =>
    bestEffort(
      'sse: cancel reader',
      () => reader.cancel(),
      options?.logPath ? { logPath: options.logPath } : {},
    )

  const consumeLine = (raw: string): boolean => {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw
    if (!line) return flushEvent()
    if (line.startsWith(':')) return false
    if (!line.startsWith('data:')) return false
    const value = line.slice(5).trimStart()
    // some relays omit the blank separator line between events
    if (dataLines.length > 0 && (value.startsWith('{') || value === '[DONE]')) {
      if (flushEvent()) return true
    }
    dataLines.push(value)
    return false
  }

  // Drains complete lines from the buffer; true once `[DONE]` was seen.
  const drainLines = (): boolean => {
    let lineBreak = buffer.indexOf('\n')
    while (lineBreak >= 0) {
      const line = buffer.slice(0, lineBreak)
      buffer = buffer.slice(lineBreak + 1)
      if (consumeLine(line)) return true
      lineBreak = buffer.indexOf('\n')
    }
    return false
  }

  for (;;) {
    if (options?.signal?.aborted) {
      await release()
      throw new CancelledError()
    }
    // a failed read leaves the stream errored; nothing to release
    const { done, value } = await reader.read()
    if (done) break
    buffer += decoder.decode(value, { stream: true })
    let sawDone: boolean
    try {
      sawDone = drainLines()
    } catch (error) {
      // `onEvent` rejected the payload; free the connection before rethrowing
      await release()
      throw error
    }
    if (sawDone) {
      stats.sawDone = true
      await release()
      return stats
    }
  }
  buffer += decoder.decode()
  const tail = buffer.trim()
  if (tail && consumeLine(tail)) stats.sawDone = true
  if (!stats.sawDone && flushEvent()) stats.sawDone = true
  return stats
}
