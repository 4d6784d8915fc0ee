import pRetry, { AbortError } from 'p-retry'

import { bestEffort } from '../log/safe.js'

import { RETRYABLE_STATUSES, RequestTimeoutError } from './errors.js'

export type TransportOptions = {
  maxAttempts: number
  retryDelayMs: number
  logPath?: string
}

export type TransportRequest = {
  url: string
  headers: Record<string, string>
  body: unknown
  /** Covers the POST and the `consume` step reading the body. */
  timeoutMs: number
}

export type Transport = {
  send: <T>(
    request: TransportRequest,
    consume: (response: Response) => Promise<T>,
  ) => Promise<T>
}

class RetryableStatusError extends Error {
  readonly response: Response
  constructor(response: Response) {
    super(`HTTP ${response.status}`)
    this.name = 'RetryableStatusError'
    this.response = response
  }
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

const discardBody = (response: Response, logPath?: string): Promise<void> =>
  bestEffort(
    'transport: discard retried body',
    () => response.body?.cancel(),
    logPath ? { logPath } : {},
  )

const post = async (
  request: TransportRequest,
  options: TransportOptions,
  signal: AbortSignal,
): Promise<Response> => {
  const retries = Math.max(0, options.maxAttempts - 1)
  try {
    return await pRetry(
      async () => {
        let response: Response
        try {
          response = await fetch(request.url, {
            method: 'POST',
            headers: request.headers,
            body: JSON.stringify(request.body),
            signal,
          })
        } catch (error) {
          // connection failures belong to the invoker's ladder
          throw new AbortError(toError(error))
        }
        if (!RETRYABLE_STATUSES.has(response.status)) return response
        throw new RetryableStatusError(response)
      },
      {
        retries,
        factor: 2,
        minTimeout: Math.max(0, options.retryDelayMs),
        randomize: false,
        onFailedAttempt: async (error) => {
          if (error.retriesLeft <= 0) return
          if (error instanceof RetryableStatusError)
            await discardBody(error.response, options.logPath)
        },
      },
    )
  } catch (error) {
    if (error instanceof RetryableStatusError) return error.response
    throw error
  }
}

/**
 * POST-only client shared by every invocation. Statuses 429/500/502/503/504
 * are retried here up to `maxAttempts`; after the last attempt the response
 * itself is handed to `consume` so the caller sees the status.
 */
export const createTransport = (options: TransportOptions): Transport => ({
  send: async (request, consume) => {
    const controller = new AbortController()
    let timedOut = false
    const timer =
      request.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true
            controller.abort()
          }, request.timeoutMs)
        : undefined
    try {
      const response = await post(request, options, controller.signal)
      return await consume(response)
    } catch (error) {
      if (timedOut) throw new RequestTimeoutError(request.timeoutMs, { cause: error })
      throw error
    } finally {
      clearTimeout(timer)
    }
  },
})
