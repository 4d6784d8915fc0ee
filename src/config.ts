import { readFileSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

import { readJson } from './fs/json.js'

const modelsSchema = z
  .object({
    code: z.string().min(1),
    writing: z.string().min(1),
    image: z.string().min(1),
  })
  .strict()

const appConfigSchema = z
  .object({
    api: z
      .object({
        url: z.string().url(),
        key: z.string(),
        timeoutMs: z.number().int().positive(),
        maxTokens: z.number().int().positive(),
        enableThinking: z.boolean(),
        models: modelsSchema,
      })
      .strict(),
    engine: z
      .object({
        maxWorkers: z.number().int().positive().max(64),
        retry: z
          .object({
            maxRetries: z.number().int().nonnegative(),
            baseDelayMs: z.number().int().nonnegative(),
            maxDelayMs: z.number().int().nonnegative(),
          })
          .strict(),
        continuation: z
          .object({
            maxRounds: z.number().int().nonnegative(),
            retries: z.number().int().nonnegative(),
            retryDelayMs: z.number().int().nonnegative(),
            continueAfterNaturalStop: z.boolean(),
          })
          .strict(),
        transport: z
          .object({
            maxAttempts: z.number().int().positive(),
            retryDelayMs: z.number().int().nonnegative(),
          })
          .strict(),
      })
      .strict(),
    paths: z
      .object({
        casesDir: z.string().min(1),
        outputDir: z.string().min(1),
      })
      .strict(),
  })
  .strict()

export type AppConfig = z.infer<typeof appConfigSchema>

const fileConfigSchema = appConfigSchema.deepPartial()
type FileConfig = z.infer<typeof fileConfigSchema>

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('../config/default.yaml', import.meta.url),
)

export const DEFAULT_USER_CONFIG_FILE = 'llm-eval.config.json'

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')

export const loadDefaultConfig = (path = DEFAULT_CONFIG_PATH): AppConfig => {
  const parsed: unknown = parseYaml(readFileSync(path, 'utf8'))
  const validated = appConfigSchema.safeParse(parsed)
  if (validated.success) return validated.data
  throw new Error(
    `[config] invalid yaml defaults: ${formatIssues(validated.error)}`,
  )
}

const readConfigFile = async (configPath: string): Promise<FileConfig> => {
  const raw = await readJson(configPath)
  if (raw === undefined) return {}
  const validated = fileConfigSchema.safeParse(raw)
  if (validated.success) return validated.data
  throw new Error(
    `[config] invalid config file ${configPath}: ${formatIssues(validated.error)}`,
  )
}

const mergeConfig = (base: AppConfig, override: FileConfig): AppConfig => ({
  api: {
    ...base.api,
    ...override.api,
    models: { ...base.api.models, ...override.api?.models },
  },
  engine: {
    ...base.engine,
    ...override.engine,
    retry: { ...base.engine.retry, ...override.engine?.retry },
    continuation: {
      ...base.engine.continuation,
      ...override.engine?.continuation,
    },
    transport: { ...base.engine.transport, ...override.engine?.transport },
  },
  paths: { ...base.paths, ...override.paths },
})

export const parseBoolean = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return undefined
}

export const parseNumber = (value: string | undefined): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

const readEnv = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim()
  return value ? value : undefined
}

const envOverrides = (env: NodeJS.ProcessEnv): FileConfig => {
  const enableThinking = parseBoolean(env.LLM_EVAL_ENABLE_THINKING)
  const maxTokens = parseNumber(env.LLM_EVAL_MAX_TOKENS)
  const maxWorkers = parseNumber(env.LLM_EVAL_MAX_WORKERS)
  const url = readEnv(env, 'LLM_EVAL_API_URL')
  const key = readEnv(env, 'LLM_EVAL_API_KEY')
  const code = readEnv(env, 'LLM_EVAL_CODE_MODEL')
  const writing = readEnv(env, 'LLM_EVAL_WRITING_MODEL')
  const image = readEnv(env, 'LLM_EVAL_IMAGE_MODEL')
  const casesDir = readEnv(env, 'LLM_EVAL_CASES_DIR')
  const outputDir = readEnv(env, 'LLM_EVAL_OUTPUT_DIR')
  return {
    api: {
      ...(url ? { url } : {}),
      ...(key ? { key } : {}),
      ...(maxTokens !== undefined ? { maxTokens } : {}),
      ...(enableThinking !== undefined ? { enableThinking } : {}),
      models: {
        ...(code ? { code } : {}),
        ...(writing ? { writing } : {}),
        ...(image ? { image } : {}),
      },
    },
    engine: maxWorkers !== undefined ? { maxWorkers } : {},
    paths: {
      ...(casesDir ? { casesDir } : {}),
      ...(outputDir ? { outputDir } : {}),
    },
  }
}

const resolvePath = (root: string, value: string): string =>
  path.isAbsolute(value) ? value : path.join(root, value)

/**
 * Layers `config/default.yaml`, then the user's JSON config file, then
 * `LLM_EVAL_*` environment variables. Relative paths resolve against
 * `workspaceRoot`.
 */
export const loadConfig = async (options?: {
  workspaceRoot?: string
  configPath?: string
  env?: NodeJS.ProcessEnv
}): Promise<AppConfig> => {
  const workspaceRoot = options?.workspaceRoot ?? process.cwd()
  const env = options?.env ?? process.env
  const configPath = resolvePath(
    workspaceRoot,
    options?.configPath ??
      readEnv(env, 'LLM_EVAL_CONFIG') ??
      DEFAULT_USER_CONFIG_FILE,
  )
  const merged = mergeConfig(
    mergeConfig(loadDefaultConfig(), await readConfigFile(configPath)),
    envOverrides(env),
  )
  const validated = appConfigSchema.safeParse(merged)
  if (!validated.success)
    throw new Error(`[config] invalid config: ${formatIssues(validated.error)}`)
  const config = validated.data
  return {
    ...config,
    api: { ...config.api, url: config.api.url.replace(/\/+$/, '') },
    paths: {
      casesDir: resolvePath(workspaceRoot, config.paths.casesDir),
      outputDir: resolvePath(workspaceRoot, config.paths.outputDir),
    },
  }
}

/** Checks the settings a run cannot start without. */
export const validateRunConfig = (config: AppConfig): string[] => {
  const problems: string[] = []
  if (!config.api.key.trim())
    problems.push('API key is missing (set LLM_EVAL_API_KEY or api.key)')
  if (config.engine.retry.maxDelayMs < config.engine.retry.baseDelayMs)
    problems.push('engine.retry.maxDelayMs must be >= engine.retry.baseDelayMs')
  return problems
}
