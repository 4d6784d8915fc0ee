import pRetry, { AbortError } from 'p-retry'

import { appendLog } from '../log/append.js'
import { appendFailureLog } from '../log/failure-log.js'
import { bestEffort, safe } from '../log/safe.js'
import { emptyUsage, resolveUsage } from '../shared/token-usage.js'
import { clip, elapsedSeconds, round2, sleep as defaultSleep } from '../shared/utils.js'

import { createStreamAccumulator, decodeChatCompletion } from './chat-response.js'
import {
  CancelledError,
  HttpStatusError,
  InvocationFailedError,
  StreamProtocolError,
  classifyError,
  describeError,
  isRetryableKind,
} from './errors.js'
import { readSseEvents } from './sse.js'

import type { ErrorKind } from './errors.js'
import type { Transport } from './http-client.js'
import type { AppConfig } from '../config.js'
import type {
  ChatCompletionEnvelope,
  ChatMessage,
  InvocationMode,
  InvocationOutcome,
  RunObserver,
  TokenUsage,
} from '../types/index.js'

export type InvokeRequest = {
  caseId: string
  model: string
  messages: ChatMessage[]
}

export type ContinuationRoundResult = {
  ok: boolean
  content: string
  usage: TokenUsage
  durationSeconds: number
  finishReason: string | null
  error?: string
}

export type ChatInvoker = {
  invoke: (
    request: InvokeRequest,
    signal?: AbortSignal,
  ) => Promise<InvocationOutcome>
  continueConversation: (
    request: InvokeRequest,
    signal?: AbortSignal,
  ) => Promise<ContinuationRoundResult>
}

export type InvokerOptions = {
  transport: Transport
  config: AppConfig
  failureLogDir: string
  observer?: Pick<RunObserver, 'log'>
  logPath?: string
  sleep?: (ms: number) => Promise<void>
  /** Returns [0, 1); drives backoff jitter. */
  random?: () => number
}

type AttemptResult = {
  envelope: ChatCompletionEnvelope
  attemptSeconds: number
}

type LadderResult =
  | (AttemptResult & { ok: true; retryCount: number; mode: InvocationMode })
  | {
      ok: false
      error: unknown
      kind: ErrorKind
      attempts: number
      retryCount: number
      mode: InvocationMode
    }

const JITTER_MS = 2_000

const toRetryError = (error: unknown): Error => {
  // p-retry gives up on non-network TypeErrors; the invoker decides instead
  if (error instanceof TypeError)
    return new Error(error.message, { cause: error })
  if (error instanceof Error) return error
  return new Error(String(error))
}

export const createInvoker = (options: InvokerOptions): ChatInvoker => {
  const { transport, config, failureLogDir, logPath } = options
  const sleep = options.sleep ?? defaultSleep
  const random = options.random ?? Math.random
  const endpoint = `${config.api.url}/chat/completions`
  const { retry, continuation } = config.engine
  const logOptions = logPath ? { logPath } : {}

  const say = (message: string) => options.observer?.log(message)

  const record = (entry: Record<string, unknown>): Promise<void> =>
    logPath
      ? bestEffort('invoker: appendLog', () => appendLog(logPath, entry), {
          logPath,
        })
      : Promise.resolve()

  const buildPayload = (request: InvokeRequest, stream: boolean) => ({
    model: request.model,
    messages: request.messages,
    max_tokens: config.api.maxTokens,
    stream,
    ...(stream ? { stream_options: { include_usage: true } } : {}),
    ...(config.api.enableThinking ? { enable_thinking: true } : {}),
  })

  const buildHeaders = (stream: boolean): Record<string, string> => ({
    'Content-Type': 'application/json',
    Accept: stream ? 'text/event-stream' : 'application/json',
    ...(config.api.key ? { Authorization: `Bearer ${config.api.key}` } : {}),
  })

  const readErrorBody = (response: Response): Promise<string> =>
    safe('invoker: read error body', () => response.text(), {
      fallback: '',
      ...logOptions,
    })

  const readStream = async (
    response: Response,
    signal?: AbortSignal,
  ): Promise<ChatCompletionEnvelope> => {
    const contentType = response.headers.get('content-type') ?? ''
    if (contentType.includes('application/json'))
      throw new StreamProtocolError(
        `expected text/event-stream, got ${contentType}`,
      )
    if (!response.body) throw new StreamProtocolError('missing response body')
    const accumulator = createStreamAccumulator()
    const stats = await readSseEvents(response.body, accumulator.push, {
      ...(signal ? { signal } : {}),
      ...logOptions,
    })
    if (stats.events === 0)
      throw new StreamProtocolError(
        stats.malformed > 0
          ? `malformed event stream (${stats.malformed} undecodable events)`
          : 'empty event stream',
      )
    return accumulator.result()
  }

  const readJson = async (
    response: Response,
  ): Promise<ChatCompletionEnvelope> => {
    const text = await response.text()
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new Error(`invalid JSON response: ${clip(text, 200)}`, {
        cause: error,
      })
    }
    return decodeChatCompletion(parsed)
  }

  const attemptOnce = async (
    request: InvokeRequest,
    mode: InvocationMode,
    signal?: AbortSignal,
  ): Promise<AttemptResult> => {
    const startedAt = Date.now()
    const stream = mode === 'stream'
    const envelope = await transport.send(
      {
        url: endpoint,
        headers: buildHeaders(stream),
        body: buildPayload(request, stream),
        timeoutMs: config.api.timeoutMs,
      },
      async (response) => {
        if (!response.ok)
          throw new HttpStatusError(
            response.status,
            clip(await readErrorBody(response), 500),
          )
        return stream ? readStream(response, signal) : readJson(response)
      },
    )
    return { envelope, attemptSeconds: elapsedSeconds(startedAt) }
  }

  const backoffDelay = (attempt: number, kind: ErrorKind): number => {
    const base = kind === 'reset' ? retry.baseDelayMs * 2 : retry.baseDelayMs
    return Math.min(
      base * 2 ** attempt + random() * JITTER_MS,
      retry.maxDelayMs,
    )
  }

  const runLadder = async (
    request: InvokeRequest,
    mode: InvocationMode,
    signal?: AbortSignal,
  ): Promise<LadderResult> => {
    let lastError: unknown
    let attempts = 0
    let retryCount = 0
    try {
      const result = await pRetry(
        async (attemptNumber) => {
          if (signal?.aborted) throw new AbortError(new CancelledError())
          attempts = attemptNumber
          say(`    [${request.caseId}] ${mode} request (attempt ${attemptNumber})`)
          try {
            return await attemptOnce(request, mode, signal)
          } catch (error) {
            lastError = error
            if (!isRetryableKind(classifyError(error)))
              throw new AbortError(toRetryError(error))
            throw toRetryError(error)
          }
        },
        {
          retries: Math.max(0, retry.maxRetries),
          minTimeout: 0,
          maxTimeout: 0,
          randomize: false,
          onFailedAttempt: async (error) => {
            if (error.retriesLeft <= 0) return
            const kind = classifyError(lastError)
            const delayMs = backoffDelay(error.attemptNumber - 1, kind)
            retryCount += 1
            say(
              `    [${request.caseId}] attempt ${error.attemptNumber} failed (${kind}): ${clip(describeError(lastError), 100)}; retrying in ${(delayMs / 1000).toFixed(1)}s`,
            )
            await record({
              event: 'invoke_retry',
              caseId: request.caseId,
              mode,
              attempt: error.attemptNumber,
              kind,
              delayMs: Math.round(delayMs),
              error: describeError(lastError),
            })
            await sleep(delayMs)
          },
        },
      )
      return { ok: true, ...result, retryCount, mode }
    } catch (error) {
      const failure =
        error instanceof CancelledError ? error : (lastError ?? error)
      return {
        ok: false,
        error: failure,
        kind: classifyError(failure),
        attempts,
        retryCount,
        mode,
      }
    }
  }

  const buildOutcome = (
    ladder: AttemptResult & { mode: InvocationMode },
    caseId: string,
    startedAt: number,
    retryCount: number,
  ): InvocationOutcome => {
    const { envelope, attemptSeconds } = ladder
    const { usage, estimated } = resolveUsage(
      envelope.usage,
      envelope.content + envelope.reasoningContent,
    )
    let content = envelope.content
    if (!content && envelope.reasoningContent) {
      content = envelope.reasoningContent
      say(`    [${caseId}] content empty, using reasoning content`)
    }
    const isIncomplete = envelope.finishReason === 'length'
    if (isIncomplete)
      say(`    [${caseId}] output truncated at max_tokens (finish_reason=length)`)
    const tokensPerSecond =
      attemptSeconds > 0 && usage.completionTokens > 0
        ? round2(usage.completionTokens / attemptSeconds)
        : 0
    say(
      `    [${caseId}] done in ${attemptSeconds.toFixed(1)}s, ${estimated ? 'estimated ' : ''}output ${usage.completionTokens} tokens`,
    )
    return {
      response: { ...envelope, content },
      usage,
      durationSeconds: round2(elapsedSeconds(startedAt)),
      retryCount,
      isIncomplete,
      finishReason: envelope.finishReason,
      tokensPerSecond,
      mode: ladder.mode,
    }
  }

  const logExhausted = (
    request: InvokeRequest,
    error: unknown,
    durationSeconds: number,
  ) =>
    bestEffort(
      'invoker: appendFailureLog',
      () =>
        appendFailureLog(failureLogDir, {
          caseId: request.caseId,
          model: request.model,
          durationSeconds,
          error: describeError(error),
          prompt: request.messages.find((m) => m.role === 'user')?.content ?? '',
        }),
      logOptions,
    )

  const fail = async (
    request: InvokeRequest,
    ladder: Extract<LadderResult, { ok: false }>,
    startedAt: number,
  ): Promise<never> => {
    const durationSeconds = round2(elapsedSeconds(startedAt))
    await record({
      event: 'invoke_failed',
      caseId: request.caseId,
      mode: ladder.mode,
      kind: ladder.kind,
      attempts: ladder.attempts,
      error: describeError(ladder.error),
    })
    if (ladder.kind === 'fatal' || ladder.kind === 'stream')
      throw new InvocationFailedError(
        `API call failed: ${describeError(ladder.error)}`,
        { attempts: ladder.attempts, durationSeconds, cause: ladder.error },
      )
    await logExhausted(request, ladder.error, durationSeconds)
    throw new InvocationFailedError(
      `API call failed after ${retry.maxRetries} retries (${durationSeconds.toFixed(1)}s): ${describeError(ladder.error)}`,
      { attempts: ladder.attempts, durationSeconds, cause: ladder.error },
    )
  }

  const invoke: ChatInvoker['invoke'] = async (request, signal) => {
    const startedAt = Date.now()
    const streamed = await runLadder(request, 'stream', signal)
    if (streamed.ok)
      return buildOutcome(streamed, request.caseId, startedAt, streamed.retryCount)
    if (streamed.kind === 'cancelled') throw streamed.error
    // a stream that keeps dropping mid-body may still work without streaming
    const fallsBack = streamed.kind === 'stream' || streamed.kind === 'reset'
    if (!fallsBack) return fail(request, streamed, startedAt)

    say(
      `    [${request.caseId}] stream unusable (${clip(describeError(streamed.error), 100)}), falling back to non-streaming`,
    )
    await record({
      event: 'invoke_fallback',
      caseId: request.caseId,
      error: describeError(streamed.error),
    })
    const fallback = await runLadder(request, 'non-stream', signal)
    const retryCount = streamed.retryCount + fallback.retryCount
    if (fallback.ok)
      return buildOutcome(fallback, request.caseId, startedAt, retryCount)
    if (fallback.kind === 'cancelled') throw fallback.error
    try {
      return await fail(request, fallback, startedAt)
    } catch (error) {
      throw new InvocationFailedError(
        `streaming and non-streaming both failed. stream: ${clip(describeError(streamed.error), 100)}; non-stream: ${clip(error instanceof Error ? error.message : String(error), 160)}`,
        {
          attempts: streamed.attempts + fallback.attempts,
          durationSeconds: round2(elapsedSeconds(startedAt)),
          cause: error,
        },
      )
    }
  }

  const failedRound = (
    startedAt: number,
    error: string,
  ): ContinuationRoundResult => ({
    ok: false,
    content: '',
    usage: emptyUsage(),
    durationSeconds: round2(elapsedSeconds(startedAt)),
    finishReason: null,
    error,
  })

  const continueConversation: ChatInvoker['continueConversation'] = async (
    request,
    signal,
  ) => {
    const startedAt = Date.now()
    const retries = Math.max(0, continuation.retries)
    for (let attempt = 0; ; attempt += 1) {
      if (signal?.aborted) return failedRound(startedAt, 'run stopped')
      say(`    [${request.caseId}] continuation request (attempt ${attempt + 1})`)
      try {
        const { envelope, attemptSeconds } = await attemptOnce(
          request,
          'stream',
          signal,
        )
        const content = envelope.content || envelope.reasoningContent
        const { usage } = resolveUsage(envelope.usage, content)
        say(
          `    [${request.caseId}] continuation done in ${attemptSeconds.toFixed(1)}s, output ${usage.completionTokens} tokens`,
        )
        return {
          ok: true,
          content,
          usage,
          durationSeconds: round2(attemptSeconds),
          finishReason: envelope.finishReason,
        }
      } catch (error) {
        const kind = classifyError(error)
        const message = describeError(error)
        const transportLevel = kind === 'reset' || kind === 'connection'
        if (!transportLevel || attempt >= retries) {
          say(`    [${request.caseId}] continuation failed: ${clip(message, 100)}`)
          await record({
            event: 'continuation_failed',
            caseId: request.caseId,
            kind,
            error: message,
          })
          return failedRound(startedAt, message)
        }
        const delayMs = (attempt + 1) * continuation.retryDelayMs
        say(
          `    [${request.caseId}] continuation transport error, retrying in ${(delayMs / 1000).toFixed(1)}s`,
        )
        await sleep(delayMs)
      }
    }
  }

  return { invoke, continueConversation }
}
