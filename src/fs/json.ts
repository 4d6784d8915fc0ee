import { mkdir, readFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import writeFileAtomicLib from 'write-file-atomic'

import { safe } from '../log/safe.js'

export const ensureDir = async (path: string): Promise<void> => {
  await mkdir(path, { recursive: true })
}

export const writeFileAtomic = async (
  path: string,
  content: string | Buffer,
): Promise<void> => {
  await ensureDir(dirname(path))
  if (typeof content === 'string')
    await writeFileAtomicLib(path, content, { encoding: 'utf8' })
  else await writeFileAtomicLib(path, content)
}

export const toJsonText = (value: unknown): string =>
  `${JSON.stringify(value, null, 2)}\n`

/**
 * Reads and parses a JSON file. A missing file yields `undefined` silently; an
 * unreadable or unparsable one is logged and also yields `undefined`. Callers
 * validate the shape.
 */
export const readJson = async (path: string): Promise<unknown> => {
  const raw = await safe<string | null>(
    'readJson: readFile',
    () => readFile(path, 'utf8'),
    { fallback: null, meta: { path }, ignoreCodes: ['ENOENT'] },
  )
  if (raw === null || !raw.trim()) return undefined
  return safe<unknown>('readJson: parse', () => JSON.parse(raw), {
    fallback: undefined,
    meta: { path },
  })
}

export const writeJson = async (path: string, value: unknown): Promise<void> => {
  await writeFileAtomic(path, toJsonText(value))
}
