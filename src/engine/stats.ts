import { addUsage, emptyUsage } from '../shared/token-usage.js'
import { round2 } from '../shared/utils.js'

import { isTimeoutMessage } from '../llm/errors.js'

import type { CaseResult, CategoryStats, SuiteKind } from '../types/index.js'

export const createCategoryStats = (totalCases = 0): CategoryStats => ({
  totalCases,
  successCount: 0,
  failedCount: 0,
  artifactExtractedCount: 0,
  noArtifactCount: 0,
  totalTokens: emptyUsage(),
  wallClockSeconds: 0,
  sumCaseSeconds: 0,
  avgSecondsPerCase: 0,
  avgOutputTokensPerCase: 0,
  avgTokensPerSecond: 0,
  timeoutCount: 0,
  retryCount: 0,
  incompleteCount: 0,
})

/** Writing has no artifact requirement. */
export const expectsArtifact = (kind: SuiteKind): boolean => kind !== 'writing'

export const hasArtifact = (result: CaseResult): boolean =>
  result.suite === 'image' ? result.hasImage === true : Boolean(result.artifactPath)

/** Folds one finished case into the running totals. */
export const recordCaseResult = (
  stats: CategoryStats,
  result: CaseResult,
): void => {
  if (!result.success) {
    stats.failedCount += 1
    if (result.error && isTimeoutMessage(result.error)) stats.timeoutCount += 1
    return
  }
  stats.successCount += 1
  stats.totalTokens = addUsage(stats.totalTokens, result.tokenUsage)
  stats.sumCaseSeconds += result.durationSeconds
  stats.retryCount += result.retryCount
  if (result.isIncomplete) stats.incompleteCount += 1
  if (!expectsArtifact(result.suite)) return
  if (hasArtifact(result)) stats.artifactExtractedCount += 1
  else stats.noArtifactCount += 1
}

/**
 * Averages come from the summed per-case durations of successful cases, not
 * from the wall clock, which concurrency compresses.
 */
export const finalizeCategoryStats = (
  stats: CategoryStats,
  wallClockSeconds: number,
): CategoryStats => {
  stats.wallClockSeconds = wallClockSeconds
  if (stats.successCount > 0) {
    stats.avgSecondsPerCase = stats.sumCaseSeconds / stats.successCount
    stats.avgOutputTokensPerCase =
      stats.totalTokens.completionTokens / stats.successCount
    stats.avgTokensPerSecond =
      stats.sumCaseSeconds > 0
        ? stats.totalTokens.completionTokens / stats.sumCaseSeconds
        : 0
  }
  return stats
}

export const rebuildCategoryStats = (
  results: readonly CaseResult[],
  wallClockSeconds: number,
): CategoryStats => {
  const stats = createCategoryStats(results.length)
  for (const result of results) recordCaseResult(stats, result)
  return finalizeCategoryStats(stats, wallClockSeconds)
}

export const toStatsRecord = (stats: CategoryStats): CategoryStats => ({
  ...stats,
  totalTokens: { ...stats.totalTokens },
  wallClockSeconds: round2(stats.wallClockSeconds),
  sumCaseSeconds: round2(stats.sumCaseSeconds),
  avgSecondsPerCase: round2(stats.avgSecondsPerCase),
  avgOutputTokensPerCase: round2(stats.avgOutputTokensPerCase),
  avgTokensPerSecond: round2(stats.avgTokensPerSecond),
})
