import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { afterEach, expect, test, vi } from 'vitest'

import { CancelledError, InvocationFailedError } from '../src/llm/errors.js'
import { createTransport } from '../src/llm/http-client.js'
import { createInvoker } from '../src/llm/invoker.js'
import { resolveFailureLogPath } from '../src/log/failure-log.js'

import { createTestConfig, createTmpDir } from './helpers/config.js'
import { deltaEvent, jsonResponse, sseResponse, usageEvent } from './helpers/sse.js'

import type { AppConfig } from '../src/config.js'
import type { InvokeRequest } from '../src/llm/invoker.js'

afterEach(() => {
  vi.unstubAllGlobals()
})

const request: InvokeRequest = {
  caseId: 'T01',
  model: 'test-model',
  messages: [{ role: 'user', content: 'write a page with a counter' }],
}

const setup = async (tune?: (config: AppConfig) => AppConfig) => {
  const dir = await createTmpDir('invoker')
  const base = createTestConfig(dir)
  const config = tune ? tune(base) : base
  const sleep = vi.fn(async (_ms: number) => undefined)
  const invoker = createInvoker({
    transport: createTransport(config.engine.transport),
    config,
    failureLogDir: join(dir, 'logs'),
    sleep,
    random: () => 0,
  })
  return { dir, config, sleep, invoker }
}

const stubFetch = (impl: () => Promise<Response>) => {
  const fetchMock = vi.fn<typeof fetch>(impl)
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

const requestBody = (fetchMock: ReturnType<typeof stubFetch>, call: number): unknown => {
  const body = fetchMock.mock.calls[call]?.[1]?.body
  return typeof body === 'string' ? JSON.parse(body) : undefined
}

test('invoke streams the completion and sends an OpenAI-style request', async () => {
  const { invoker } = await setup()
  const fetchMock = stubFetch(async () =>
    sseResponse([
      deltaEvent('Hello'),
      deltaEvent(' world', 'stop'),
      usageEvent(12, 4),
      'data: [DONE]',
    ]),
  )

  const outcome = await invoker.invoke(request)

  expect(outcome.response.content).toBe('Hello world')
  expect(outcome.usage).toEqual({ promptTokens: 12, completionTokens: 4, totalTokens: 16 })
  expect(outcome.finishReason).toBe('stop')
  expect(outcome.isIncomplete).toBe(false)
  expect(outcome.retryCount).toBe(0)
  expect(outcome.mode).toBe('stream')

  expect(fetchMock.mock.calls[0]?.[0]).toBe('https://llm.test/v1/chat/completions')
  expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
    Authorization: 'Bearer test-secret',
    Accept: 'text/event-stream',
  })
  expect(requestBody(fetchMock, 0)).toEqual({
    model: 'test-model',
    messages: request.messages,
    max_tokens: 16384,
    stream: true,
    stream_options: { include_usage: true },
  })
})

test('invoke gives up after maxRetries retries on connection errors and logs the failure', async () => {
  const { dir, sleep, invoker } = await setup((config) => ({
    ...config,
    engine: {
      ...config.engine,
      retry: { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 250 },
    },
  }))
  const fetchMock = stubFetch(async () => {
    throw new TypeError('fetch failed')
  })

  const failure = invoker.invoke(request)
  await expect(failure).rejects.toBeInstanceOf(InvocationFailedError)
  await expect(failure).rejects.toThrow(
    /^API call failed after 3 retries \(\d+\.\ds\): fetch failed$/,
  )
  expect(fetchMock).toHaveBeenCalledTimes(4)
  expect(sleep.mock.calls).toEqual([[100], [200], [250]])

  const log = await readFile(resolveFailureLogPath(join(dir, 'logs')), 'utf8')
  expect(log).toContain('case: T01\nmodel: test-model\n')
  expect(log).toContain('error: fetch failed\nprompt: write a page with a counter...\n')
})

test('invoke retries a retryable status and counts the retry', async () => {
  const { sleep, invoker } = await setup()
  const fetchMock = vi
    .fn<typeof fetch>()
    .mockResolvedValueOnce(new Response('overloaded', { status: 503 }))
    .mockResolvedValueOnce(sseResponse([deltaEvent('fine', 'stop')]))
  vi.stubGlobal('fetch', fetchMock)

  const outcome = await invoker.invoke(request)
  expect(outcome.response.content).toBe('fine')
  expect(outcome.retryCount).toBe(1)
  expect(sleep).toHaveBeenCalledTimes(1)
  expect(fetchMock).toHaveBeenCalledTimes(2)
})

test('invoke does not retry a truncated completion', async () => {
  const { invoker } = await setup()
  const fetchMock = stubFetch(async () =>
    sseResponse([deltaEvent('<!DOCTYPE html><html>', 'length'), 'data: [DONE]']),
  )
  const outcome = await invoker.invoke(request)
  expect(outcome.isIncomplete).toBe(true)
  expect(outcome.finishReason).toBe('length')
  expect(fetchMock).toHaveBeenCalledTimes(1)
})

test('invoke falls back to a non-streaming request when the stream is unusable', async () => {
  const { invoker } = await setup()
  const fetchMock = stubFetch(async () =>
    jsonResponse({
      choices: [{ message: { content: 'fallback body' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 3, completion_tokens: 5, total_tokens: 8 },
    }),
  )

  const outcome = await invoker.invoke(request)
  expect(outcome.mode).toBe('non-stream')
  expect(outcome.response.content).toBe('fallback body')
  expect(outcome.usage).toEqual({ promptTokens: 3, completionTokens: 5, totalTokens: 8 })
  expect(fetchMock).toHaveBeenCalledTimes(2)
  expect(requestBody(fetchMock, 0)).toMatchObject({ stream: true })
  expect(requestBody(fetchMock, 1)).toMatchObject({ stream: false })
})

test('invoke fails at once on a client error without writing the failure log', async () => {
  const { dir, invoker } = await setup()
  const fetchMock = stubFetch(async () => new Response('bad request', { status: 400 }))

  await expect(invoker.invoke(request)).rejects.toThrow(
    'API call failed: HTTP 400: bad request',
  )
  expect(fetchMock).toHaveBeenCalledTimes(1)
  await expect(
    readFile(resolveFailureLogPath(join(dir, 'logs')), 'utf8'),
  ).rejects.toThrow()
})

test('invoke estimates usage when the provider reports none', async () => {
  const { invoker } = await setup()
  stubFetch(async () => sseResponse([deltaEvent('a'.repeat(40), 'stop')]))
  const outcome = await invoker.invoke(request)
  expect(outcome.usage).toEqual({ promptTokens: 0, completionTokens: 10, totalTokens: 10 })
})

test('invoke uses reasoning content when the answer is empty', async () => {
  const { invoker } = await setup()
  stubFetch(async () =>
    sseResponse([
      'data: {"choices":[{"delta":{"reasoning_content":"thinking text"},"finish_reason":"stop"}]}',
    ]),
  )
  const outcome = await invoker.invoke(request)
  expect(outcome.response.content).toBe('thinking text')
  expect(outcome.response.reasoningContent).toBe('thinking text')
})

test('invoke rejects with CancelledError when the run is already stopped', async () => {
  const { invoker } = await setup()
  const fetchMock = stubFetch(async () => sseResponse([deltaEvent('never')]))
  const controller = new AbortController()
  controller.abort()
  await expect(invoker.invoke(request, controller.signal)).rejects.toBeInstanceOf(
    CancelledError,
  )
  expect(fetchMock).not.toHaveBeenCalled()
})

test('continueConversation retries transport drops and returns the round', async () => {
  const { sleep, invoker } = await setup((config) => ({
    ...config,
    engine: {
      ...config.engine,
      continuation: { ...config.engine.continuation, retryDelayMs: 5_000 },
    },
  }))
  vi.stubGlobal(
    'fetch',
    vi
      .fn<typeof fetch>()
      .mockRejectedValueOnce(new Error('other side closed'))
      .mockResolvedValueOnce(
        sseResponse([deltaEvent('</html>', 'stop'), usageEvent(30, 2)]),
      ),
  )

  const round = await invoker.continueConversation(request)
  expect(round).toMatchObject({
    ok: true,
    content: '</html>',
    finishReason: 'stop',
    usage: { promptTokens: 30, completionTokens: 2, totalTokens: 32 },
  })
  expect(sleep.mock.calls).toEqual([[5_000]])
})

test('continueConversation reports a client error as a failed round', async () => {
  const { sleep, invoker } = await setup()
  const fetchMock = stubFetch(async () => new Response('nope', { status: 400 }))
  const round = await invoker.continueConversation(request)
  expect(round).toMatchObject({ ok: false, content: '', error: 'HTTP 400: nope' })
  expect(fetchMock).toHaveBeenCalledTimes(1)
  expect(sleep).not.toHaveBeenCalled()
})

const droppedStream = (): Response => {
  const encoder = new TextEncoder()
  const body = new ReadableStream<Uint8Array>({
    start: (controller) => {
      controller.enqueue(encoder.encode(`${deltaEvent('<!DOCTYPE html>')}\n\n`))
    },
    pull: (controller) => {
      controller.error(
        new TypeError('terminated', { cause: new Error('other side closed') }),
      )
    },
  })
  return new Response(body, {
    status: 200,
    headers: { 'content-type': 'text/event-stream' },
  })
}

const isStreamCall = (init?: RequestInit): boolean =>
  typeof init?.body === 'string' && init.body.includes('"stream":true')

test('invoke waits longer after dropped streams and then falls back to non-streaming', async () => {
  const { sleep, invoker } = await setup((config) => ({
    ...config,
    engine: {
      ...config.engine,
      retry: { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1_000 },
    },
  }))
  const fetchMock = vi.fn<typeof fetch>(async (_input, init) =>
    isStreamCall(init)
      ? droppedStream()
      : jsonResponse({
          choices: [{ message: { content: 'whole page' }, finish_reason: 'stop' }],
        }),
  )
  vi.stubGlobal('fetch', fetchMock)

  const outcome = await invoker.invoke(request)

  expect(outcome.mode).toBe('non-stream')
  expect(outcome.response.content).toBe('whole page')
  expect(outcome.retryCount).toBe(3)
  expect(sleep.mock.calls).toEqual([[200], [400], [800]])
  expect(fetchMock).toHaveBeenCalledTimes(5)
  expect(requestBody(fetchMock, 4)).toMatchObject({ stream: false })
})

test('invoke adds the fallback retries to the streaming retries', async () => {
  const { sleep, invoker } = await setup()
  let nonStreamCalls = 0
  const fetchMock = vi.fn<typeof fetch>(async (_input, init) => {
    if (isStreamCall(init)) return droppedStream()
    nonStreamCalls += 1
    return nonStreamCalls === 1
      ? new Response('overloaded', { status: 503 })
      : jsonResponse({
          choices: [{ message: { content: 'second try' }, finish_reason: 'stop' }],
        })
  })
  vi.stubGlobal('fetch', fetchMock)

  const outcome = await invoker.invoke(request)

  expect(outcome.mode).toBe('non-stream')
  expect(outcome.response.content).toBe('second try')
  expect(outcome.retryCount).toBe(4)
  expect(sleep).toHaveBeenCalledTimes(4)
  expect(fetchMock).toHaveBeenCalledTimes(6)
})

test('invoke reports both paths and every attempt when the fallback fails too', async () => {
  const { invoker } = await setup()
  const fetchMock = vi.fn<typeof fetch>(async (_input, init) =>
    isStreamCall(init)
      ? jsonResponse({ choices: [] })
      : new Response('boom', { status: 500 }),
  )
  vi.stubGlobal('fetch', fetchMock)

  const error = await invoker.invoke(request).catch((reason: unknown) => reason)

  expect(error).toBeInstanceOf(InvocationFailedError)
  if (!(error instanceof InvocationFailedError)) return
  expect(error.message).toMatch(
    /^streaming and non-streaming both failed\. stream: expected text\/event-stream, got application\/json; non-stream: API call failed after 3 retries \(\d+\.\ds\): HTTP 500 \(internal server error\): boom$/,
  )
  expect(error.attempts).toBe(5)
  expect(fetchMock).toHaveBeenCalledTimes(5)
})

test('invoke asks for thinking output when enableThinking is set', async () => {
  const { invoker } = await setup((config) => ({
    ...config,
    api: { ...config.api, enableThinking: true },
  }))
  const fetchMock = stubFetch(async () => sseResponse([deltaEvent('ok', 'stop')]))

  await invoker.invoke(request)

  expect(requestBody(fetchMock, 0)).toMatchObject({
    stream: true,
    enable_thinking: true,
  })
})
