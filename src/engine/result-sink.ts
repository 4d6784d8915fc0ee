import { join } from 'node:path'

import { writeFileAtomic, writeJson } from '../fs/json.js'
import { sanitizeFileName } from '../shared/utils.js'

import { toStatsRecord } from './stats.js'

import type { OutputPaths } from '../fs/paths.js'
import type {
  CaseResult,
  CategoryStats,
  SuiteKind,
  TestCase,
} from '../types/index.js'

export type ResultSink = {
  /** `<outputDir>/<kind>/<safeId>_<safeName>`, without extension. */
  caseBasePath: (kind: SuiteKind, testCase: TestCase) => string
  writeCaseResult: (result: CaseResult) => Promise<string>
  writeText: (path: string, text: string) => Promise<void>
  writeStats: (kind: SuiteKind, stats: CategoryStats) => Promise<void>
  writeSummary: (summary: unknown) => Promise<void>
}

export const createResultSink = (paths: OutputPaths): ResultSink => {
  const caseBasePath: ResultSink['caseBasePath'] = (kind, testCase) =>
    join(
      paths.suites[kind],
      `${sanitizeFileName(testCase.id)}_${sanitizeFileName(testCase.name)}`,
    )

  return {
    caseBasePath,
    writeCaseResult: async (result) => {
      const path = `${caseBasePath(result.suite, result)}.json`
      await writeJson(path, result)
      return path
    },
    writeText: (path, text) => writeFileAtomic(path, text),
    writeStats: (kind, stats) => writeJson(paths.stats[kind], toStatsRecord(stats)),
    writeSummary: (summary) => writeJson(paths.summary, summary),
  }
}
