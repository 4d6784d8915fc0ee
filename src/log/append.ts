import { createHash } from 'node:crypto'
import { once } from 'node:events'
import { mkdir } from 'node:fs/promises'
import { basename, dirname } from 'node:path'

import pino, { type Logger } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

export type LogLevel = 'info' | 'warn' | 'error'

// One engine.log per output directory, rotated daily or at 10 MB.
const ROTATION = {
  size: '10M',
  interval: '1d',
  maxFiles: 30,
} as const

const LOG_SCHEMA = 'llm-eval.log.v1'

const EVENT_LEVELS: Record<string, LogLevel> = {
  suite_started: 'info',
  suite_finished: 'info',
  run_finished: 'info',
  retry_finished: 'info',
  invoke_retry: 'warn',
  invoke_fallback: 'warn',
  run_cancelled: 'warn',
  continuation_failed: 'warn',
  invoke_failed: 'error',
  error: 'error',
}

type RunLog = {
  logger: Logger
  stream: RotatingFileStream
}

const openLogs = new Map<string, Promise<RunLog>>()

const openRunLog = async (path: string): Promise<RunLog> => {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })
  const stream = createStream(basename(path), { ...ROTATION, path: dir })
  stream.on('error', (error) => {
    console.error(`[log] ${path} stream error`, error)
  })
  const logger = pino(
    { base: { schema: LOG_SCHEMA }, timestamp: pino.stdTimeFunctions.isoTime },
    stream,
  )
  return { logger, stream }
}

// Concurrent cases write to the same file, so the open is shared too.
const runLogFor = (path: string): Promise<RunLog> => {
  const pending = openLogs.get(path)
  if (pending) return pending
  const opened = openRunLog(path)
  openLogs.set(path, opened)
  opened.catch(() => openLogs.delete(path))
  return opened
}

const nonEmpty = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined

/** Entries about the same case share a trace id across retries and suites. */
export const traceIdFor = (entry: Record<string, unknown>): string => {
  const caseId = nonEmpty(entry['caseId'])
  const suite = nonEmpty(entry['suite'])
  const seed =
    nonEmpty(entry['traceId']) ??
    (caseId ? `case:${suite ? `${suite}:` : ''}${caseId}` : undefined) ??
    (suite ? `suite:${suite}` : JSON.stringify(entry))
  return createHash('sha1').update(seed).digest('hex').slice(0, 16)
}

export const resolveLevel = (entry: Record<string, unknown>): LogLevel => {
  const explicit = entry['level']
  if (explicit === 'info' || explicit === 'warn' || explicit === 'error')
    return explicit
  const event = nonEmpty(entry['event']) ?? ''
  const known = EVENT_LEVELS[event]
  if (known) return known
  return /fail|cancel|retry|timeout|invalid|abort/i.test(event) ? 'warn' : 'info'
}

/** Appends one structured entry to the run log at `path`. */
export const appendLog = async (
  path: string,
  entry: Record<string, unknown>,
): Promise<void> => {
  const { logger, stream } = await runLogFor(path)
  const { level: _level, ...fields } = entry
  logger[resolveLevel(entry)]({ traceId: traceIdFor(entry), ...fields })
  if (stream.writableNeedDrain) await once(stream, 'drain')
}

/** Ends every open log stream; called once when the process is done. */
export const closeLogs = async (): Promise<void> => {
  const pending = [...openLogs.values()]
  openLogs.clear()
  for (const opened of pending) {
    const { stream } = await opened
    if (stream.writableEnded) continue
    const finished = once(stream, 'finish')
    stream.end()
    await finished
  }
}
