import { readErrorCode } from '../log/safe.js'

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
])

const STATUS_LABELS: Record<number, string> = {
  429: 'too many requests',
  500: 'internal server error',
  502: 'bad gateway',
  503: 'service unavailable',
  504: 'gateway timeout',
}

export class HttpStatusError extends Error {
  readonly status: number
  readonly body: string
  constructor(status: number, body: string) {
    const label = STATUS_LABELS[status]
    super(`HTTP ${status}${label ? ` (${label})` : ''}${body ? `: ${body}` : ''}`)
    this.name = 'HttpStatusError'
    this.status = status
    this.body = body
  }
}

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number
  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`request timeout after ${Math.round(timeoutMs / 1000)}s`, options)
    this.name = 'RequestTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** The upstream answered, but not with a usable event stream. */
export class StreamProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StreamProtocolError'
  }
}

export class CancelledError extends Error {
  constructor(message = 'run stopped') {
    super(message)
    this.name = 'CancelledError'
  }
}

export class InvocationFailedError extends Error {
  readonly attempts: number
  readonly durationSeconds: number
  constructor(
    message: string,
    details: { attempts: number; durationSeconds: number; cause?: unknown },
  ) {
    super(message, { cause: details.cause })
    this.name = 'InvocationFailedError'
    this.attempts = details.attempts
    this.durationSeconds = details.durationSeconds
  }
}

export type ErrorKind =
  | 'cancelled'
  | 'stream'
  | 'fatal'
  | 'status'
  | 'timeout'
  | 'reset'
  | 'connection'
  | 'unknown'

const readMessage = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined
  const normalized = value.trim()
  return normalized ? normalized : undefined
}

const parseErrorNode = (
  value: unknown,
): { message?: string; code?: string; cause?: unknown } => {
  if (!value || typeof value !== 'object') return {}
  const message =
    value instanceof Error
      ? readMessage(value.message)
      : 'message' in value
        ? readMessage(value.message)
        : undefined
  const code = readErrorCode(value)
  const cause = 'cause' in value ? value.cause : undefined
  return {
    ...(message ? { message } : {}),
    ...(code ? { code } : {}),
    ...(cause !== undefined ? { cause } : {}),
  }
}

const collectChain = (value: unknown): string[] => {
  const nodes: string[] = []
  let current: unknown = value
  const seen = new Set<unknown>()
  for (let depth = 0; depth < 4 && current !== undefined; depth += 1) {
    if (typeof current === 'object' && current !== null) {
      if (seen.has(current)) break
      seen.add(current)
    }
    const parsed = parseErrorNode(current)
    const part = [parsed.message ?? '', parsed.code ? `code=${parsed.code}` : '']
      .filter(Boolean)
      .join(', ')
    if (part) nodes.push(part)
    if (parsed.cause === undefined || parsed.cause === current) break
    current = parsed.cause
  }
  return nodes
}

/** Message plus its cause chain, e.g. `fetch failed (cause: connect ECONNREFUSED)`. */
export const describeError = (err: unknown): string => {
  if (!(err instanceof Error)) return String(err)
  const cause = collectChain(err).slice(1).join(' -> ')
  return cause ? `${err.message} (cause: ${cause})` : err.message
}

// Transport dropped mid-response; these get a longer cooldown.
const RESET_PATTERN =
  /prematurely|incomplete|terminated|broken pipe|reset by peer|other side closed|ECONNRESET|EPIPE|UND_ERR_SOCKET/i

const CONNECTION_PATTERN =
  /fetch failed|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|EHOSTUNREACH|UND_ERR_CONNECT/i

export const classifyError = (error: unknown): ErrorKind => {
  if (error instanceof CancelledError) return 'cancelled'
  if (error instanceof StreamProtocolError) return 'stream'
  if (error instanceof HttpStatusError)
    return RETRYABLE_STATUSES.has(error.status) ? 'status' : 'fatal'
  if (error instanceof RequestTimeoutError) return 'timeout'
  const text = collectChain(error).join(' | ')
  if (RESET_PATTERN.test(text)) return 'reset'
  if (CONNECTION_PATTERN.test(text)) return 'connection'
  return 'unknown'
}

export const isRetryableKind = (kind: ErrorKind): boolean =>
  kind !== 'cancelled' && kind !== 'stream' && kind !== 'fatal'

export const isTimeoutMessage = (message: string): boolean =>
  /timeout|timed out/i.test(message)
