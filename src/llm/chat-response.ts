import { z } from 'zod'

import { normalizeChatUsage } from '../shared/token-usage.js'

import type { ChatCompletionEnvelope, TokenUsage } from '../types/index.js'

// Every upstream field is optional; a field of the wrong shape decodes as absent.
const textPartSchema = z.object({ text: z.string().optional().catch(undefined) })

const contentSchema = z
  .union([z.string(), z.array(z.unknown())])
  .nullish()
  .catch(undefined)

const messageSchema = z
  .object({
    content: contentSchema,
    reasoning_content: z.string().nullish().catch(undefined),
  })
  .nullish()
  .catch(undefined)

const choiceSchema = z.object({
  message: messageSchema,
  delta: messageSchema,
  finish_reason: z.string().nullish().catch(undefined),
})

const usageSchema = z
  .object({
    prompt_tokens: z.number().optional().catch(undefined),
    completion_tokens: z.number().optional().catch(undefined),
    total_tokens: z.number().optional().catch(undefined),
  })
  .nullish()
  .catch(undefined)

const upstreamErrorSchema = z
  .union([z.string(), z.object({ message: z.string().optional().catch(undefined) })])
  .nullish()
  .catch(undefined)

const completionSchema = z
  .object({
    choices: z.array(choiceSchema.nullable().catch(null)).optional().catch(undefined),
    usage: usageSchema,
    error: upstreamErrorSchema,
  })
  .catch({})

type DecodedCompletion = z.infer<typeof completionSchema>
type DecodedContent = z.infer<typeof contentSchema>

const readText = (content: DecodedContent): string => {
  if (typeof content === 'string') return content
  if (!Array.isArray(content)) return ''
  let text = ''
  for (const part of content) {
    const parsed = textPartSchema.safeParse(part)
    if (parsed.success && parsed.data.text) text += parsed.data.text
  }
  return text
}

const firstChoice = (decoded: DecodedCompletion) => decoded.choices?.[0] ?? null

/** Upstream errors sometimes arrive with status 200 as `{ error: ... }`. */
const readUpstreamError = (decoded: DecodedCompletion): string | undefined => {
  if (decoded.choices && decoded.choices.length > 0) return undefined
  const { error } = decoded
  if (typeof error === 'string') return error || undefined
  if (error) return error.message ?? 'upstream error'
  return undefined
}

export class UpstreamPayloadError extends Error {
  constructor(message: string) {
    super(`upstream error: ${message}`)
    this.name = 'UpstreamPayloadError'
  }
}

/** Maps a non-streaming response body onto the fixed envelope shape. */
export const decodeChatCompletion = (raw: unknown): ChatCompletionEnvelope => {
  const decoded = completionSchema.parse(raw)
  const upstreamError = readUpstreamError(decoded)
  if (upstreamError) throw new UpstreamPayloadError(upstreamError)
  const choice = firstChoice(decoded)
  const usage = normalizeChatUsage(decoded.usage)
  return {
    content: readText(choice?.message?.content),
    reasoningContent: choice?.message?.reasoning_content ?? '',
    finishReason: choice?.finish_reason ?? null,
    ...(usage ? { usage } : {}),
    raw,
  }
}

export type StreamAccumulator = {
  push: (event: unknown) => void
  result: () => ChatCompletionEnvelope
}

/**
 * Folds streamed chunks: `delta.content` and `delta.reasoning_content` are
 * concatenated separately, the last `finish_reason` and `usage` win.
 */
export const createStreamAccumulator = (): StreamAccumulator => {
  let content = ''
  let reasoning = ''
  let finishReason: string | null = null
  let usage: TokenUsage | undefined
  return {
    push: (event) => {
      const decoded = completionSchema.parse(event)
      const upstreamError = readUpstreamError(decoded)
      if (upstreamError) throw new UpstreamPayloadError(upstreamError)
      const choice = firstChoice(decoded)
      if (choice) {
        content += readText(choice.delta?.content)
        reasoning += choice.delta?.reasoning_content ?? ''
        if (choice.finish_reason) finishReason = choice.finish_reason
      }
      usage = normalizeChatUsage(decoded.usage) ?? usage
    },
    result: () => ({
      content,
      reasoningContent: reasoning,
      finishReason,
      ...(usage ? { usage } : {}),
      raw: {
        choices: [
          {
            message: {
              content,
              reasoning_content: reasoning || null,
            },
            finish_reason: finishReason,
          },
        ],
        usage: usage
          ? {
              prompt_tokens: usage.promptTokens,
              completion_tokens: usage.completionTokens,
              total_tokens: usage.totalTokens,
            }
          : null,
      },
    }),
  }
}
