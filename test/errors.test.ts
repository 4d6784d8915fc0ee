import { expect, test } from 'vitest'

import {
  CancelledError,
  HttpStatusError,
  RequestTimeoutError,
  StreamProtocolError,
  classifyError,
  describeError,
  isRetryableKind,
  isTimeoutMessage,
} from '../src/llm/errors.js'

const withCode = (message: string, code: string) =>
  Object.assign(new Error(message), { code })

test('HttpStatusError labels well-known statuses', () => {
  expect(new HttpStatusError(503, 'busy').message).toBe(
    'HTTP 503 (service unavailable): busy',
  )
  expect(new HttpStatusError(400, '').message).toBe('HTTP 400')
})

test('classifyError sorts failures into retry classes', () => {
  expect(classifyError(new CancelledError())).toBe('cancelled')
  expect(classifyError(new StreamProtocolError('empty event stream'))).toBe('stream')
  expect(classifyError(new HttpStatusError(429, ''))).toBe('status')
  expect(classifyError(new HttpStatusError(401, 'no'))).toBe('fatal')
  expect(classifyError(new RequestTimeoutError(1_000))).toBe('timeout')
  expect(
    classifyError(new TypeError('terminated', { cause: withCode('other side closed', 'UND_ERR_SOCKET') })),
  ).toBe('reset')
  expect(
    classifyError(new TypeError('fetch failed', { cause: withCode('connect refused', 'ECONNREFUSED') })),
  ).toBe('connection')
  expect(classifyError(new Error('something odd'))).toBe('unknown')
})

test('isRetryableKind retries everything but cancellation, stream and fatal errors', () => {
  expect(isRetryableKind('unknown')).toBe(true)
  expect(isRetryableKind('reset')).toBe(true)
  expect(isRetryableKind('fatal')).toBe(false)
  expect(isRetryableKind('stream')).toBe(false)
  expect(isRetryableKind('cancelled')).toBe(false)
})

test('describeError appends the cause chain', () => {
  expect(
    describeError(
      new TypeError('fetch failed', { cause: withCode('connect ECONNREFUSED', 'ECONNREFUSED') }),
    ),
  ).toBe('fetch failed (cause: connect ECONNREFUSED, code=ECONNREFUSED)')
  expect(describeError('plain')).toBe('plain')
})

test('isTimeoutMessage matches timeout wording', () => {
  expect(isTimeoutMessage('request timeout after 1200s')).toBe(true)
  expect(isTimeoutMessage('socket timed out')).toBe(true)
  expect(isTimeoutMessage('HTTP 500')).toBe(false)
})
