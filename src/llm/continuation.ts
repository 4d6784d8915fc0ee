import { addUsage, emptyUsage } from '../shared/token-usage.js'
import { round2 } from '../shared/utils.js'

import type { ChatInvoker } from './invoker.js'
import type { ChatMessage, TokenUsage } from '../types/index.js'

export const CONTINUE_PROMPT =
  'Continue from where you stopped without repeating anything already written. Output only the remaining part.'

export const CONTINUE_CONVERSATION_MAX = 3

export type ContinuationStop =
  | 'complete'
  | 'empty'
  | 'failed'
  | 'finished'
  | 'max_rounds'
  | 'cancelled'

export type ContinuationResult = {
  content: string
  rounds: number
  usage: TokenUsage
  durationSeconds: number
  complete: boolean
  lastFinishReason: string | null
  stoppedBy: ContinuationStop
}

export type ContinuationParams = {
  invoker: ChatInvoker
  caseId: string
  model: string
  prompt: string
  /** The truncated output so far. */
  content: string
  isComplete: (content: string) => boolean
  maxRounds?: number
  /** Keep going after a round that stopped for a reason other than `length`. */
  continueAfterNaturalStop?: boolean
  signal?: AbortSignal
  log?: (message: string) => void
}

/**
 * Asks the model to resume truncated output, one round at a time, appending
 * each round to the accumulated content. Usage and time are summed over the
 * rounds that succeeded; `rounds` counts those rounds.
 */
export const continueUntilComplete = async (
  params: ContinuationParams,
): Promise<ContinuationResult> => {
  const maxRounds = params.maxRounds ?? CONTINUE_CONVERSATION_MAX
  const log = params.log ?? (() => undefined)
  const messages: ChatMessage[] = [
    { role: 'user', content: params.prompt },
    { role: 'assistant', content: params.content },
    { role: 'user', content: CONTINUE_PROMPT },
  ]
  let combined = params.content
  let usage = emptyUsage()
  let durationSeconds = 0
  let rounds = 0
  let lastFinishReason: string | null = null

  const finish = (stoppedBy: ContinuationStop): ContinuationResult => ({
    content: combined,
    rounds,
    usage,
    durationSeconds: round2(durationSeconds),
    complete: params.isComplete(combined),
    lastFinishReason,
    stoppedBy,
  })

  while (rounds < maxRounds) {
    if (params.signal?.aborted) return finish('cancelled')
    const round = await params.invoker.continueConversation(
      { caseId: params.caseId, model: params.model, messages: [...messages] },
      params.signal,
    )
    if (!round.ok || !round.content) {
      log(
        `    [${params.caseId}] continuation round ${rounds + 1} ${round.ok ? 'returned nothing' : 'failed'}`,
      )
      return finish(round.ok ? 'empty' : 'failed')
    }
    rounds += 1
    combined += `\n${round.content}`
    usage = addUsage(usage, round.usage)
    durationSeconds += round.durationSeconds
    lastFinishReason = round.finishReason
    messages.push(
      { role: 'assistant', content: round.content },
      { role: 'user', content: CONTINUE_PROMPT },
    )

    if (params.isComplete(combined)) {
      log(`    [${params.caseId}] output complete after ${rounds} continuation round(s)`)
      return finish('complete')
    }
    if (round.finishReason !== 'length' && !params.continueAfterNaturalStop) {
      log(
        `    [${params.caseId}] continuation round ${rounds} ended (finish_reason=${round.finishReason ?? 'none'}) without completing the output`,
      )
      return finish('finished')
    }
  }
  return finish('max_rounds')
}
