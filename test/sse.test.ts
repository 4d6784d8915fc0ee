import { expect, test, vi } from 'vitest'

import { CancelledError } from '../src/llm/errors.js'
import { readSseEvents } from '../src/llm/sse.js'

import { toSseBody } from './helpers/sse.js'

const rawBody = (text: string): ReadableStream<Uint8Array> =>
  new Response(text).body ?? toSseBody([])

test('readSseEvents decodes data events, skips comments and stops at [DONE]', async () => {
  const onEvent = vi.fn()
  const stats = await readSseEvents(
    toSseBody([
      'data: {"a":1}',
      ': keep-alive',
      'data: {"a":2}',
      'data: [DONE]',
      'data: {"a":3}',
    ]),
    onEvent,
  )
  expect(onEvent.mock.calls).toEqual([[{ a: 1 }], [{ a: 2 }]])
  expect(stats).toEqual({ events: 2, malformed: 0, sawDone: true })
})

test('readSseEvents joins multi-line data fields', async () => {
  const onEvent = vi.fn()
  await readSseEvents(toSseBody(['data: {"a":\ndata: 1}']), onEvent)
  expect(onEvent).toHaveBeenCalledWith({ a: 1 })
})

test('readSseEvents splits events that arrive without blank separators', async () => {
  const onEvent = vi.fn()
  const stats = await readSseEvents(
    rawBody('data: {"a":1}\ndata: {"a":2}\ndata: [DONE]\n'),
    onEvent,
  )
  expect(onEvent.mock.calls).toEqual([[{ a: 1 }], [{ a: 2 }]])
  expect(stats).toEqual({ events: 2, malformed: 0, sawDone: true })
})

test('readSseEvents counts undecodable events and handles CRLF', async () => {
  const onEvent = vi.fn()
  const stats = await readSseEvents(
    rawBody('data: not json\r\n\r\ndata: {"ok":true}\r\n\r\n'),
    onEvent,
  )
  expect(onEvent.mock.calls).toEqual([[{ ok: true }]])
  expect(stats).toEqual({ events: 1, malformed: 1, sawDone: false })
})

test('readSseEvents stops with CancelledError once the signal is aborted', async () => {
  const controller = new AbortController()
  controller.abort()
  await expect(
    readSseEvents(toSseBody(['data: {"a":1}']), vi.fn(), {
      signal: controller.signal,
    }),
  ).rejects.toBeInstanceOf(CancelledError)
})

test('readSseEvents cancels the body when the event handler throws', async () => {
  const encoder = new TextEncoder()
  let cancelled = false
  const body = new ReadableStream<Uint8Array>({
    start: (controller) => {
      controller.enqueue(encoder.encode('data: {"a":1}\n\n'))
    },
    cancel: () => {
      cancelled = true
    },
  })
  const onEvent = vi.fn(() => {
    throw new Error('bad chunk')
  })

  await expect(readSseEvents(body, onEvent)).rejects.toThrow('bad chunk')
  expect(onEvent).toHaveBeenCalledTimes(1)
  expect(cancelled).toBe(true)
})
