import PQueue from 'p-queue'

import { buildPaths, ensureOutputLayout } from '../fs/paths.js'
import { CancelledError } from '../llm/errors.js'
import { createTransport } from '../llm/http-client.js'
import { createInvoker } from '../llm/invoker.js'
import { appendLog } from '../log/append.js'
import { bestEffort, logSafeError, setDefaultLogPath } from '../log/safe.js'
import { addUsage, emptyUsage } from '../shared/token-usage.js'
import { elapsedSeconds, nowIso, round2 } from '../shared/utils.js'
import { SUITE_KINDS } from '../types/index.js'

import { createCaseLoader } from './case-loader.js'
import { runCase } from './case-runner.js'
import { createResultSink } from './result-sink.js'
import {
  createCategoryStats,
  expectsArtifact,
  finalizeCategoryStats,
  hasArtifact,
  rebuildCategoryStats,
  recordCaseResult,
  toStatsRecord,
} from './stats.js'

import type { CaseLoader } from './case-loader.js'
import type { CaseRunContext } from './case-runner.js'
import type { ResultSink } from './result-sink.js'
import type { AppConfig } from '../config.js'
import type { OutputPaths } from '../fs/paths.js'
import type { ChatInvoker } from '../llm/invoker.js'
import type {
  CaseResult,
  CategoryStats,
  RunObserver,
  SuiteKind,
  TestCase,
  TokenUsage,
} from '../types/index.js'

export type TestEngineOptions = {
  config: AppConfig
  observer?: Partial<RunObserver>
  invoker?: ChatInvoker
  loader?: CaseLoader
}

export type ProgressRange = readonly [start: number, end: number]

export type RunSummary = {
  timestamp: string
  totalTimeSeconds: number
  totalTokens: TokenUsage
  suites: Partial<Record<SuiteKind, CategoryStats>>
  config: {
    apiUrl: string
    models: AppConfig['api']['models']
    maxWorkers: number
    maxTokens: number
    enableThinking: boolean
  }
}

const toTestCase = (result: CaseResult): TestCase => ({
  id: result.id,
  name: result.name,
  category: result.category,
  difficulty: result.difficulty,
  tags: result.tags,
  icon: result.icon,
  prompt: result.prompt,
})

const isGoodResult = (result: CaseResult): boolean =>
  result.success && (!expectsArtifact(result.suite) || hasArtifact(result))

const buildFailedResult = (
  kind: SuiteKind,
  model: string,
  testCase: TestCase,
  error: string,
): CaseResult => ({
  ...testCase,
  suite: kind,
  model,
  success: false,
  timestamp: nowIso(),
  response: '',
  reasoningContent: null,
  error,
  tokenUsage: emptyUsage(),
  durationSeconds: 0,
  retryCount: 0,
  tokensPerSecond: 0,
  isIncomplete: false,
  finishReason: null,
})

/**
 * Runs suites of cases against the chat API on a bounded pool. Results are
 * kept per suite for a later retry pass. `stop()` is final: pending cases are
 * dropped, in-flight ones finish, and later runs on this engine stop at once.
 */
export class TestEngine {
  private readonly config: AppConfig
  private readonly paths: OutputPaths
  private readonly observer: RunObserver
  private readonly invoker: ChatInvoker
  private readonly loader: CaseLoader
  private readonly sink: ResultSink
  private readonly controller = new AbortController()
  private readonly results: Partial<Record<SuiteKind, CaseResult[]>> = {}
  private readonly stats: Partial<Record<SuiteKind, CategoryStats>> = {}
  private startedAt: number | null = null
  private endedAt: number | null = null

  constructor(options: TestEngineOptions) {
    const { config } = options
    this.config = config
    this.paths = buildPaths(config.paths.outputDir)
    setDefaultLogPath(this.paths.engineLog)
    this.observer = {
      log: options.observer?.log ?? ((message) => console.log(message)),
      progress: options.observer?.progress ?? (() => undefined),
    }
    this.invoker =
      options.invoker ??
      createInvoker({
        transport: createTransport({
          ...config.engine.transport,
          logPath: this.paths.engineLog,
        }),
        config,
        failureLogDir: this.paths.logsDir,
        observer: this.observer,
        logPath: this.paths.engineLog,
      })
    this.loader =
      options.loader ??
      createCaseLoader({
        casesDir: config.paths.casesDir,
        log: this.observer.log,
      })
    this.sink = createResultSink(this.paths)
  }

  get stopped(): boolean {
    return this.controller.signal.aborted
  }

  stop(): void {
    if (this.stopped) return
    this.controller.abort()
    this.observer.log('stopping: pending cases dropped, in-flight cases finish')
    void this.record({ event: 'run_cancelled' })
  }

  getResults(kind: SuiteKind): readonly CaseResult[] {
    return this.results[kind] ?? []
  }

  getStats(kind: SuiteKind): CategoryStats | undefined {
    return this.stats[kind]
  }

  modelFor(kind: SuiteKind): string {
    return this.config.api.models[kind]
  }

  private record(entry: Record<string, unknown>): Promise<void> {
    return bestEffort('testEngine: appendLog', () =>
      appendLog(this.paths.engineLog, entry),
    )
  }

  private caseContext(kind: SuiteKind): CaseRunContext {
    return {
      kind,
      model: this.modelFor(kind),
      invoker: this.invoker,
      sink: this.sink,
      continuation: {
        maxRounds: this.config.engine.continuation.maxRounds,
        continueAfterNaturalStop:
          this.config.engine.continuation.continueAfterNaturalStop,
      },
      signal: this.controller.signal,
      log: this.observer.log,
      logPath: this.paths.engineLog,
    }
  }

  /** `null` when the case was cut short by `stop()`. */
  private async runOne(
    kind: SuiteKind,
    testCase: TestCase,
  ): Promise<CaseResult | null> {
    try {
      return await runCase(this.caseContext(kind), testCase)
    } catch (error) {
      if (error instanceof CancelledError) {
        this.observer.log(`[${kind}] ${testCase.id} cancelled`)
        return null
      }
      const message = error instanceof Error ? error.message : String(error)
      return buildFailedResult(kind, this.modelFor(kind), testCase, message)
    }
  }

  private persistFailure(result: CaseResult): Promise<void> {
    return bestEffort(
      'testEngine: writeCaseResult',
      () => this.sink.writeCaseResult(result),
      { meta: { caseId: result.id, suite: result.suite } },
    )
  }

  /**
   * Fans `cases` out on a pool of `maxWorkers`. `onResult` runs once per
   * recorded case, in completion order.
   */
  private async executeCases(
    kind: SuiteKind,
    cases: readonly TestCase[],
    onResult: (result: CaseResult) => void,
  ): Promise<void> {
    const queue = new PQueue({ concurrency: this.config.engine.maxWorkers })
    const { signal } = this.controller
    const dropPending = () => queue.clear()
    signal.addEventListener('abort', dropPending, { once: true })
    try {
      for (const testCase of cases) {
        if (signal.aborted) break
        void queue
          .add(async () => {
            if (signal.aborted) return
            const result = await this.runOne(kind, testCase)
            if (result) onResult(result)
          })
          .catch((error) =>
            logSafeError('testEngine: case job', error, {
              meta: { suite: kind, caseId: testCase.id },
            }),
          )
      }
      await queue.onIdle()
    } finally {
      signal.removeEventListener('abort', dropPending)
    }
  }

  private logCase(kind: SuiteKind, result: CaseResult): void {
    if (result.success) {
      this.observer.log(
        `[${kind}] ${result.id} ${result.name} - ok (${result.durationSeconds}s, ${result.tokensPerSecond.toFixed(1)} tok/s)`,
      )
      return
    }
    this.observer.log(
      `[${kind}] ${result.id} ${result.name} - failed: ${result.error ?? 'unknown error'}`,
    )
  }

  private logStats(kind: SuiteKind, stats: CategoryStats): void {
    const lines = [
      `[${kind}] finished: ${stats.successCount}/${stats.totalCases} ok, ${stats.failedCount} failed`,
      `    artifacts: ${stats.artifactExtractedCount} extracted, ${stats.noArtifactCount} missing`,
      `    tokens: ${stats.totalTokens.totalTokens} (prompt ${stats.totalTokens.promptTokens}, completion ${stats.totalTokens.completionTokens})`,
      `    wall clock ${stats.wallClockSeconds.toFixed(1)}s, per case ${stats.avgSecondsPerCase.toFixed(1)}s, ${stats.avgTokensPerSecond.toFixed(1)} tok/s`,
    ]
    if (stats.timeoutCount > 0) lines.push(`    timeouts: ${stats.timeoutCount}`)
    if (stats.retryCount > 0) lines.push(`    retries: ${stats.retryCount}`)
    if (stats.incompleteCount > 0)
      lines.push(`    incomplete: ${stats.incompleteCount}`)
    for (const line of lines) this.observer.log(line)
  }

  private async publishStats(
    kind: SuiteKind,
    stats: CategoryStats,
  ): Promise<void> {
    this.stats[kind] = stats
    this.logStats(kind, stats)
    await bestEffort('testEngine: writeStats', () =>
      this.sink.writeStats(kind, stats),
    )
    await this.record({
      event: 'suite_finished',
      suite: kind,
      ...toStatsRecord(stats),
    })
  }

  async runSuite(
    kind: SuiteKind,
    range: ProgressRange = [0, 100],
  ): Promise<CaseResult[]> {
    const [start, end] = range
    await ensureOutputLayout(this.paths)
    const cases = await this.loader.load(kind)
    const results: CaseResult[] = []
    this.results[kind] = results
    if (cases.length === 0) {
      this.observer.log(`[${kind}] no cases to run`)
      await this.publishStats(kind, createCategoryStats(0))
      this.observer.progress(end)
      return results
    }

    const model = this.modelFor(kind)
    this.observer.log(`[${kind}] starting ${cases.length} cases on ${model}`)
    await this.record({ event: 'suite_started', suite: kind, model, cases: cases.length })
    const stats = createCategoryStats(cases.length)
    const failureWrites: Promise<void>[] = []
    const startedAt = Date.now()
    await this.executeCases(kind, cases, (result) => {
      results.push(result)
      recordCaseResult(stats, result)
      this.logCase(kind, result)
      if (!result.success) failureWrites.push(this.persistFailure(result))
      this.observer.progress(
        start + (results.length / cases.length) * (end - start),
      )
    })
    await Promise.all(failureWrites)
    if (this.stopped) stats.totalCases = stats.successCount + stats.failedCount
    await this.publishStats(
      kind,
      finalizeCategoryStats(stats, elapsedSeconds(startedAt)),
    )
    return results
  }

  /** Runs the suites one after another; each owns an equal progress slice. */
  async runAll(kinds: readonly SuiteKind[] = SUITE_KINDS): Promise<RunSummary> {
    this.startedAt = Date.now()
    this.endedAt = null
    const slice = kinds.length > 0 ? 100 / kinds.length : 100
    for (const [index, kind] of kinds.entries()) {
      if (this.stopped) break
      await this.runSuite(kind, [index * slice, (index + 1) * slice])
    }
    return this.saveSummary()
  }

  /**
   * Re-runs failed cases, and code/image cases that succeeded without an
   * artifact, then splices the new results in by id. Returns how many cases
   * now have a good result.
   */
  async retryFailed(target: SuiteKind | 'all' = 'all'): Promise<number> {
    const kinds = target === 'all' ? SUITE_KINDS : [target]
    let flipped = 0
    for (const kind of kinds) {
      if (this.stopped) break
      const current = this.results[kind]
      if (!current || current.length === 0) continue
      const candidates = current.filter((result) => !isGoodResult(result))
      if (candidates.length === 0) continue

      this.observer.log(`[${kind}] retrying ${candidates.length} cases`)
      const indexById = new Map(current.map((result, index) => [result.id, index]))
      const failureWrites: Promise<void>[] = []
      const startedAt = Date.now()
      await this.executeCases(kind, candidates.map(toTestCase), (result) => {
        const index = indexById.get(result.id)
        if (index === undefined) return
        const previous = current[index]
        // a failed retry never replaces an earlier successful call
        if (!result.success && previous?.success) {
          this.observer.log(`[${kind}] ${result.id} retry failed: ${result.error ?? ''}`)
          return
        }
        current[index] = result
        if (!result.success) failureWrites.push(this.persistFailure(result))
        if (isGoodResult(result)) {
          flipped += 1
          this.observer.log(`[${kind}] ${result.id} ${result.name} - retry ok`)
        } else this.logCase(kind, result)
      })
      await Promise.all(failureWrites)
      const wallClock =
        (this.stats[kind]?.wallClockSeconds ?? 0) + elapsedSeconds(startedAt)
      await this.publishStats(kind, rebuildCategoryStats(current, wallClock))
    }
    await this.record({ event: 'retry_finished', target, flipped })
    return flipped
  }

  getStatsSummary(): RunSummary {
    const end = this.endedAt ?? Date.now()
    const suites: Partial<Record<SuiteKind, CategoryStats>> = {}
    let totalTokens = emptyUsage()
    for (const kind of SUITE_KINDS) {
      const stats = this.stats[kind]
      if (!stats) continue
      suites[kind] = toStatsRecord(stats)
      totalTokens = addUsage(totalTokens, stats.totalTokens)
    }
    return {
      timestamp: nowIso(),
      totalTimeSeconds:
        this.startedAt === null ? 0 : round2(elapsedSeconds(this.startedAt, end)),
      totalTokens,
      suites,
      config: {
        apiUrl: this.config.api.url,
        models: { ...this.config.api.models },
        maxWorkers: this.config.engine.maxWorkers,
        maxTokens: this.config.api.maxTokens,
        enableThinking: this.config.api.enableThinking,
      },
    }
  }

  async saveSummary(): Promise<RunSummary> {
    this.endedAt = Date.now()
    const summary = this.getStatsSummary()
    await ensureOutputLayout(this.paths)
    await this.sink.writeSummary(summary)
    this.observer.log(
      `run finished in ${summary.totalTimeSeconds}s, ${summary.totalTokens.totalTokens} tokens; summary at ${this.paths.summary}`,
    )
    await this.record({
      event: 'run_finished',
      totalTimeSeconds: summary.totalTimeSeconds,
      totalTokens: summary.totalTokens.totalTokens,
    })
    return summary
  }
}
