import { expect, test, vi } from 'vitest'

import { extractHtml } from '../src/engine/extract-html.js'
import { CONTINUE_PROMPT, continueUntilComplete } from '../src/llm/continuation.js'

import { createStubInvoker, failedRound, okRound } from './helpers/invoker-stub.js'

const TRUNCATED = '```html\n<!DOCTYPE html>\n<html><body>'

const params = {
  caseId: 'T02',
  model: 'test-coder',
  prompt: 'build a clock',
  content: TRUNCATED,
  isComplete: (text: string) => extractHtml(text).complete,
}

test('continueUntilComplete stops after the round limit', async () => {
  const invoker = createStubInvoker({
    continueConversation: async () => okRound('<p>more</p>', 'length'),
  })

  const result = await continueUntilComplete({ ...params, invoker, maxRounds: 3 })

  expect(invoker.continueCalls).toHaveLength(3)
  expect(result).toMatchObject({
    rounds: 3,
    stoppedBy: 'max_rounds',
    complete: false,
    lastFinishReason: 'length',
    usage: { promptTokens: 3, completionTokens: 6, totalTokens: 9 },
    durationSeconds: 1.5,
  })
  expect(result.content).toBe(
    `${TRUNCATED}\n<p>more</p>\n<p>more</p>\n<p>more</p>`,
  )
  expect(invoker.continueCalls[0]?.messages).toEqual([
    { role: 'user', content: 'build a clock' },
    { role: 'assistant', content: TRUNCATED },
    { role: 'user', content: CONTINUE_PROMPT },
  ])
  expect(invoker.continueCalls[1]?.messages.slice(3)).toEqual([
    { role: 'assistant', content: '<p>more</p>' },
    { role: 'user', content: CONTINUE_PROMPT },
  ])
})

test('continueUntilComplete returns as soon as the document closes', async () => {
  const invoker = createStubInvoker({
    continueConversation: async () => okRound('</body></html>\n```', 'stop'),
  })
  const log = vi.fn()

  const result = await continueUntilComplete({ ...params, invoker, log })

  expect(result).toMatchObject({ rounds: 1, stoppedBy: 'complete', complete: true })
  expect(result.content).toBe(`${TRUNCATED}\n</body></html>\n\`\`\``)
  expect(log).toHaveBeenCalledWith(
    '    [T02] output complete after 1 continuation round(s)',
  )
})

test('continueUntilComplete ends on a natural stop unless told to keep going', async () => {
  const invoker = createStubInvoker({
    continueConversation: async () => okRound('<p>still open</p>', 'stop'),
  })
  const stopped = await continueUntilComplete({ ...params, invoker })
  expect(stopped).toMatchObject({ rounds: 1, stoppedBy: 'finished' })

  const kept = await continueUntilComplete({
    ...params,
    invoker,
    maxRounds: 2,
    continueAfterNaturalStop: true,
  })
  expect(kept).toMatchObject({ rounds: 2, stoppedBy: 'max_rounds' })
})

test('continueUntilComplete keeps the partial output when a round fails or is empty', async () => {
  const failing = createStubInvoker({
    continueConversation: async () => failedRound('HTTP 400: nope'),
  })
  const failed = await continueUntilComplete({ ...params, invoker: failing })
  expect(failed).toMatchObject({ rounds: 0, stoppedBy: 'failed', content: TRUNCATED })

  const silent = createStubInvoker({
    continueConversation: async () => okRound('', 'stop'),
  })
  const empty = await continueUntilComplete({ ...params, invoker: silent })
  expect(empty).toMatchObject({ rounds: 0, stoppedBy: 'empty', content: TRUNCATED })
})

test('continueUntilComplete does nothing once the signal is aborted', async () => {
  const invoker = createStubInvoker({
    continueConversation: async () => okRound('</html>'),
  })
  const controller = new AbortController()
  controller.abort()
  const result = await continueUntilComplete({
    ...params,
    invoker,
    signal: controller.signal,
  })
  expect(result.stoppedBy).toBe('cancelled')
  expect(invoker.continueCalls).toHaveLength(0)
})
