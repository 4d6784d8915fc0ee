import { continueUntilComplete } from '../llm/continuation.js'
import { safe } from '../log/safe.js'
import { addUsage } from '../shared/token-usage.js'
import { clip, nowIso, round2 } from '../shared/utils.js'

import { extractHtml } from './extract-html.js'
import { redactBase64Images, saveBase64Image } from './extract-image.js'

import type { ResultSink } from './result-sink.js'
import type { ChatInvoker } from '../llm/invoker.js'
import type {
  CaseResult,
  InvocationOutcome,
  SuiteKind,
  TestCase,
} from '../types/index.js'

export type CaseRunContext = {
  kind: SuiteKind
  model: string
  invoker: ChatInvoker
  sink: ResultSink
  continuation: { maxRounds: number; continueAfterNaturalStop: boolean }
  signal?: AbortSignal
  log: (message: string) => void
  logPath?: string
}

const REASONING_EXCERPT_CHARS = 500
const EMPTY_RESPONSE = '(empty response)'

/** Shared part of every successful result; also settles the response text. */
const buildBaseResult = (
  ctx: CaseRunContext,
  testCase: TestCase,
  outcome: InvocationOutcome,
): CaseResult => {
  const { content, reasoningContent, raw } = outcome.response
  let response = content
  let rawResponse: string | undefined
  if (!content && !reasoningContent) {
    rawResponse = JSON.stringify(raw ?? null, null, 2)
    response = rawResponse
    ctx.log(`    [${testCase.id}] content and reasoning both empty, keeping raw response`)
  }
  return {
    ...testCase,
    suite: ctx.kind,
    model: ctx.model,
    success: true,
    timestamp: nowIso(),
    response,
    reasoningContent: reasoningContent || null,
    tokenUsage: outcome.usage,
    durationSeconds: outcome.durationSeconds,
    retryCount: outcome.retryCount,
    tokensPerSecond: outcome.tokensPerSecond,
    isIncomplete: outcome.isIncomplete,
    finishReason: outcome.finishReason,
    ...(rawResponse !== undefined ? { rawResponse } : {}),
  }
}

const runCodeCase = async (
  ctx: CaseRunContext,
  testCase: TestCase,
  outcome: InvocationOutcome,
): Promise<CaseResult> => {
  let result = buildBaseResult(ctx, testCase, outcome)
  let extraction = extractHtml(result.response)

  if (extraction.html && !extraction.complete && outcome.isIncomplete) {
    ctx.log(`    [${testCase.id}] HTML truncated, continuing the conversation`)
    const healed = await continueUntilComplete({
      invoker: ctx.invoker,
      caseId: testCase.id,
      model: ctx.model,
      prompt: testCase.prompt,
      content: result.response,
      isComplete: (text) => extractHtml(text).complete,
      maxRounds: ctx.continuation.maxRounds,
      continueAfterNaturalStop: ctx.continuation.continueAfterNaturalStop,
      log: ctx.log,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
    })
    extraction = extractHtml(healed.content)
    const tokenUsage = addUsage(result.tokenUsage, healed.usage)
    const durationSeconds = round2(
      result.durationSeconds + healed.durationSeconds,
    )
    result = {
      ...result,
      response: healed.content,
      tokenUsage,
      durationSeconds,
      tokensPerSecond:
        durationSeconds > 0 && tokenUsage.completionTokens > 0
          ? round2(tokenUsage.completionTokens / durationSeconds)
          : 0,
      continuationRounds: healed.rounds,
    }
  }

  const basePath = ctx.sink.caseBasePath('code', testCase)
  if (extraction.html) {
    const artifactPath = `${basePath}.html`
    await ctx.sink.writeText(artifactPath, extraction.html)
    if (!extraction.complete)
      ctx.log(`    [${testCase.id}] HTML still incomplete (no closing </html>)`)
    return {
      ...result,
      artifactPath,
      htmlComplete: extraction.complete,
      isIncomplete: !extraction.complete,
    }
  }
  const rawTextPath = `${basePath}_raw.txt`
  await ctx.sink.writeText(rawTextPath, result.response || EMPTY_RESPONSE)
  ctx.log(`    [${testCase.id}] no HTML found, raw response kept`)
  return { ...result, rawTextPath, htmlComplete: false }
}

const runImageCase = async (
  ctx: CaseRunContext,
  testCase: TestCase,
  outcome: InvocationOutcome,
): Promise<CaseResult> => {
  const base = buildBaseResult(ctx, testCase, outcome)
  const basePath = ctx.sink.caseBasePath('image', testCase)
  const imagePath = await safe(
    'caseRunner: saveBase64Image',
    () => saveBase64Image(base.response, basePath),
    {
      fallback: null,
      meta: { caseId: testCase.id },
      ...(ctx.logPath ? { logPath: ctx.logPath } : {}),
    },
  )
  const result: CaseResult = {
    ...base,
    response: redactBase64Images(base.response),
    reasoningContent: base.reasoningContent
      ? clip(base.reasoningContent, REASONING_EXCERPT_CHARS)
      : null,
    hasImage: imagePath !== null,
  }
  if (imagePath) return { ...result, artifactPath: imagePath }
  const rawTextPath = `${basePath}_raw.txt`
  await ctx.sink.writeText(rawTextPath, base.response || EMPTY_RESPONSE)
  ctx.log(`    [${testCase.id}] no image found, raw response kept`)
  return { ...result, rawTextPath }
}

export const countWords = (text: string): number =>
  text.split(/\s+/).filter(Boolean).length

export const formatWritingText = (testCase: TestCase, response: string) =>
  `=== ${testCase.name} ===\n\n[Prompt]\n${testCase.prompt}\n\n[Response]\n${response}\n`

const runWritingCase = async (
  ctx: CaseRunContext,
  testCase: TestCase,
  outcome: InvocationOutcome,
): Promise<CaseResult> => {
  const base = buildBaseResult(ctx, testCase, outcome)
  const rawTextPath = `${ctx.sink.caseBasePath('writing', testCase)}.txt`
  await ctx.sink.writeText(rawTextPath, formatWritingText(testCase, base.response))
  return {
    ...base,
    charCount: Array.from(base.response).length,
    wordCount: countWords(base.response),
    rawTextPath,
  }
}

const RUNNERS: Record<
  SuiteKind,
  (
    ctx: CaseRunContext,
    testCase: TestCase,
    outcome: InvocationOutcome,
  ) => Promise<CaseResult>
> = {
  code: runCodeCase,
  image: runImageCase,
  writing: runWritingCase,
}

/**
 * One case end to end: invoke, extract, persist. Invocation errors propagate;
 * the orchestrator turns them into failed results.
 */
export const runCase = async (
  ctx: CaseRunContext,
  testCase: TestCase,
): Promise<CaseResult> => {
  const outcome = await ctx.invoker.invoke(
    {
      caseId: testCase.id,
      model: ctx.model,
      messages: [{ role: 'user', content: testCase.prompt }],
    },
    ctx.signal,
  )
  const result = await RUNNERS[ctx.kind](ctx, testCase, outcome)
  await ctx.sink.writeCaseResult(result)
  return result
}
