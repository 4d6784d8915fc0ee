#!/usr/bin/env node
import { parseRunArgs } from './cli/args.js'
import { loadConfig, validateRunConfig } from './config.js'
import { TestEngine } from './engine/test-engine.js'
import { closeLogs } from './log/append.js'

const printUsage = (): void => {
  console.log(`Usage:
  llm-eval run [--suites code,writing,image] [--config <path>] [--retry-failed]

Environment:
  LLM_EVAL_API_URL, LLM_EVAL_API_KEY, LLM_EVAL_CODE_MODEL, LLM_EVAL_WRITING_MODEL,
  LLM_EVAL_IMAGE_MODEL, LLM_EVAL_MAX_WORKERS, LLM_EVAL_MAX_TOKENS,
  LLM_EVAL_ENABLE_THINKING, LLM_EVAL_OUTPUT_DIR, LLM_EVAL_CASES_DIR, LLM_EVAL_CONFIG
`)
}

const createProgressPrinter = () => {
  let lastStep = -1
  return (percent: number): void => {
    const step = Math.floor(percent / 10)
    if (step === lastStep) return
    lastStep = step
    console.log(`[progress] ${Math.round(percent)}%`)
  }
}

const run = async (args: string[]): Promise<number> => {
  const parsed = parseRunArgs(args)
  if (!parsed.ok) {
    console.error(`[cli] ${parsed.error}`)
    printUsage()
    return 1
  }
  if ('help' in parsed) {
    printUsage()
    return 0
  }
  const { suites, retryFailed, configPath } = parsed.value
  const config = await loadConfig(configPath ? { configPath } : {})
  const problems = validateRunConfig(config)
  if (problems.length > 0) {
    for (const problem of problems) console.error(`[cli] ${problem}`)
    return 1
  }

  const engine = new TestEngine({
    config,
    observer: {
      log: (message) => console.log(message),
      progress: createProgressPrinter(),
    },
  })
  let interrupts = 0
  const onSigint = () => {
    interrupts += 1
    if (interrupts > 1) process.exit(130)
    console.log('[cli] interrupt received, finishing in-flight cases (Ctrl+C again to quit)')
    engine.stop()
  }
  process.on('SIGINT', onSigint)
  try {
    await engine.runAll(suites)
    if (retryFailed && !engine.stopped) {
      const flipped = await engine.retryFailed('all')
      console.log(`[cli] retry pass: ${flipped} cases recovered`)
      await engine.saveSummary()
    }
    return engine.stopped ? 130 : 0
  } finally {
    process.off('SIGINT', onSigint)
  }
}

const main = async (argv: string[]): Promise<number> => {
  const [command, ...rest] = argv
  if (command === 'help' || command === '--help' || command === '-h') {
    printUsage()
    return 0
  }
  // `run` is the default command
  const runArgs = command === 'run' ? rest : argv
  if (command !== undefined && command !== 'run' && !command.startsWith('--')) {
    console.error(`[cli] unknown command: ${command}`)
    printUsage()
    return 1
  }
  try {
    return await run(runArgs)
  } catch (error) {
    console.error('[cli] fatal', error)
    return 1
  } finally {
    await closeLogs()
  }
}

process.exitCode = await main(process.argv.slice(2))
