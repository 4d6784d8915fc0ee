import { z } from 'zod'

export type ISODate = string

export const SUITE_KINDS = ['code', 'writing', 'image'] as const
export type SuiteKind = (typeof SUITE_KINDS)[number]

export const isSuiteKind = (value: string): value is SuiteKind =>
  (SUITE_KINDS as readonly string[]).includes(value)

export const difficultySchema = z.enum(['low', 'medium', 'high'])
export type Difficulty = z.infer<typeof difficultySchema>

export const testCaseSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  category: z.string().default('uncategorized'),
  difficulty: difficultySchema.catch('medium'),
  tags: z.array(z.string()).catch([]),
  icon: z.string().optional(),
  prompt: z.string().min(1),
})

export type TestCase = {
  id: string
  name: string
  category: string
  difficulty: Difficulty
  tags: string[]
  icon: string
  prompt: string
}

export type TokenUsage = {
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export type ChatRole = 'system' | 'user' | 'assistant'

export type ChatMessage = {
  role: ChatRole
  content: string
}

export type ChatCompletionEnvelope = {
  content: string
  reasoningContent: string
  finishReason: string | null
  usage?: TokenUsage
  raw: unknown
}

export type InvocationMode = 'stream' | 'non-stream'

export type InvocationOutcome = {
  response: ChatCompletionEnvelope
  usage: TokenUsage
  durationSeconds: number
  retryCount: number
  isIncomplete: boolean
  finishReason: string | null
  tokensPerSecond: number
  mode: InvocationMode
}

export type CaseResult = {
  id: string
  name: string
  category: string
  difficulty: Difficulty
  tags: string[]
  icon: string
  prompt: string
  suite: SuiteKind
  model: string
  success: boolean
  timestamp: ISODate
  response: string
  reasoningContent: string | null
  error?: string
  tokenUsage: TokenUsage
  durationSeconds: number
  retryCount: number
  tokensPerSecond: number
  isIncomplete: boolean
  finishReason: string | null
  rawResponse?: string
  artifactPath?: string
  rawTextPath?: string
  htmlComplete?: boolean
  continuationRounds?: number
  hasImage?: boolean
  charCount?: number
  wordCount?: number
}

export type CategoryStats = {
  totalCases: number
  successCount: number
  failedCount: number
  artifactExtractedCount: number
  noArtifactCount: number
  totalTokens: TokenUsage
  wallClockSeconds: number
  sumCaseSeconds: number
  avgSecondsPerCase: number
  avgOutputTokensPerCase: number
  avgTokensPerSecond: number
  timeoutCount: number
  retryCount: number
  incompleteCount: number
}

export type RunObserver = {
  log: (message: string) => void
  progress: (percent: number) => void
}
