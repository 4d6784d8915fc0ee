import { join } from 'node:path'

import { SUITE_KINDS, type SuiteKind } from '../types/index.js'

import { ensureDir } from './json.js'

export type OutputPaths = {
  root: string
  logsDir: string
  engineLog: string
  summary: string
  suites: Record<SuiteKind, string>
  stats: Record<SuiteKind, string>
}

const perSuite = (
  build: (kind: SuiteKind) => string,
): Record<SuiteKind, string> => ({
  code: build('code'),
  writing: build('writing'),
  image: build('image'),
})

export const buildPaths = (outputDir: string): OutputPaths => {
  const root = outputDir
  const logsDir = join(root, 'logs')
  return {
    root,
    logsDir,
    engineLog: join(logsDir, 'engine.log'),
    summary: join(root, '_summary_stats.json'),
    suites: perSuite((kind) => join(root, kind)),
    stats: perSuite((kind) => join(root, kind, '_stats.json')),
  }
}

export const ensureOutputLayout = async (paths: OutputPaths): Promise<void> => {
  await ensureDir(paths.logsDir)
  for (const kind of SUITE_KINDS) await ensureDir(paths.suites[kind])
}
