import { asNumber } from './utils.js'

import type { TokenUsage } from '../types/index.js'

export const emptyUsage = (): TokenUsage => ({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
})

export const addUsage = (left: TokenUsage, right: TokenUsage): TokenUsage => ({
  promptTokens: left.promptTokens + right.promptTokens,
  completionTokens: left.completionTokens + right.completionTokens,
  totalTokens: left.totalTokens + right.totalTokens,
})

export const normalizeChatUsage = (
  usage?: {
    prompt_tokens?: unknown
    completion_tokens?: unknown
    total_tokens?: unknown
  } | null,
): TokenUsage | undefined => {
  if (!usage) return undefined
  const prompt = asNumber(usage.prompt_tokens)
  const completion = asNumber(usage.completion_tokens)
  const total = asNumber(usage.total_tokens)
  if (prompt === undefined && completion === undefined && total === undefined)
    return undefined
  return {
    promptTokens: prompt ?? 0,
    completionTokens: completion ?? 0,
    totalTokens: total ?? (prompt ?? 0) + (completion ?? 0),
  }
}

/**
 * Rough token count for providers that omit `usage`: about four characters per
 * token. English-centric; CJK text averages fewer characters per token, so the
 * figure undercounts there.
 */
export const estimateTokens = (text: string): number =>
  Math.floor(text.length / 4)

export const resolveUsage = (
  usage: TokenUsage | undefined,
  generatedText: string,
): { usage: TokenUsage; estimated: boolean } => {
  if (usage && usage.totalTokens > 0) return { usage, estimated: false }
  const completion = estimateTokens(generatedText)
  return {
    usage: {
      promptTokens: usage?.promptTokens ?? 0,
      completionTokens: completion,
      totalTokens: completion,
    },
    estimated: true,
  }
}
