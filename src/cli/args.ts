import { SUITE_KINDS, isSuiteKind } from '../types/index.js'

import type { SuiteKind } from '../types/index.js'

export type RunArgs = {
  suites: SuiteKind[]
  retryFailed: boolean
  configPath?: string
}

export type RunParseResult =
  | { ok: true; value: RunArgs }
  | { ok: false; error: string }
  | { ok: true; help: true }

const parseSuites = (value: string): SuiteKind[] | string => {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean)
  if (names.length === 0) return '--suites requires at least one suite'
  const suites: SuiteKind[] = []
  for (const name of names) {
    if (!isSuiteKind(name))
      return `unknown suite: ${name} (expected ${SUITE_KINDS.join('|')})`
    if (!suites.includes(name)) suites.push(name)
  }
  return suites
}

/** Arguments after the `run` command. */
export const parseRunArgs = (args: string[]): RunParseResult => {
  let suites: SuiteKind[] = [...SUITE_KINDS]
  let configPath: string | undefined
  let retryFailed = false

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i]
    if (arg === undefined) continue
    if (arg === '--help' || arg === '-h') return { ok: true, help: true }
    if (arg === '--retry-failed') {
      retryFailed = true
      continue
    }
    if (arg === '--suites' || arg === '--config') {
      const value = args[i + 1]
      if (!value || value.startsWith('--'))
        return { ok: false, error: `${arg} requires a value` }
      i += 1
      if (arg === '--config') {
        configPath = value
        continue
      }
      const parsed = parseSuites(value)
      if (typeof parsed === 'string') return { ok: false, error: parsed }
      suites = parsed
      continue
    }
    return { ok: false, error: `Unknown option: ${arg}` }
  }

  const value: RunArgs = { suites, retryFailed }
  if (configPath !== undefined) value.configPath = configPath
  return { ok: true, value }
}
