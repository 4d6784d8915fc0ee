import { appendFile, mkdir } from 'node:fs/promises'
import { join } from 'node:path'

import { formatDateStamp, nowIso } from '../shared/utils.js'

import { logSafeError } from './safe.js'

export type FailureRecord = {
  caseId: string
  model: string
  durationSeconds: number
  error: string
  prompt: string
}

const RULE = '='.repeat(80)
const PROMPT_EXCERPT_CHARS = 100

const writesByPath = new Map<string, Promise<void>>()

export const resolveFailureLogPath = (dir: string, date = new Date()): string =>
  join(dir, `failures_${formatDateStamp(date)}.log`)

export const formatFailureRecord = (
  record: FailureRecord,
  at = nowIso(),
): string =>
  [
    '',
    RULE,
    `time: ${at}`,
    `case: ${record.caseId}`,
    `model: ${record.model}`,
    `duration: ${record.durationSeconds.toFixed(1)}s`,
    `error: ${record.error}`,
    `prompt: ${record.prompt.slice(0, PROMPT_EXCERPT_CHARS)}...`,
    RULE,
    '',
  ].join('\n')

/**
 * Appends one human-readable block to the day's failure log. Each write opens,
 * appends and closes the file; writes to the same path are chained so blocks
 * from concurrent cases never interleave.
 */
export const appendFailureLog = async (
  dir: string,
  record: FailureRecord,
): Promise<void> => {
  const filePath = resolveFailureLogPath(dir)
  const prev = writesByPath.get(filePath) ?? Promise.resolve()
  const next = prev
    .catch((error) =>
      logSafeError('appendFailureLog: previous', error, {
        meta: { path: filePath },
      }),
    )
    .then(async () => {
      await mkdir(dir, { recursive: true })
      await appendFile(filePath, formatFailureRecord(record), 'utf8')
    })
  writesByPath.set(filePath, next)
  await next
}
