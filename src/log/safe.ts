import { appendLog } from './append.js'

export type SafeLogOptions = {
  logPath?: string
  meta?: Record<string, unknown>
  /** Error codes (e.g. `ENOENT`) that are expected and not worth a log line. */
  ignoreCodes?: string[]
}

let fallbackLogPath: string | null = null

/** Where errors go when the caller names no log file; the engine sets it. */
export const setDefaultLogPath = (path?: string | null): void => {
  fallbackLogPath = path?.trim() || null
}

export const readErrorCode = (error: unknown): string | undefined => {
  if (!error || typeof error !== 'object' || !('code' in error))
    return undefined
  const { code } = error
  if (typeof code === 'number') return String(code)
  return typeof code === 'string' && code ? code : undefined
}

const toLogEntry = (
  context: string,
  error: unknown,
  meta?: Record<string, unknown>,
): Record<string, unknown> => {
  const entry: Record<string, unknown> = { event: 'error', context }
  if (error instanceof Error) {
    entry['error'] = error.message
    entry['errorName'] = error.name
    const code = readErrorCode(error)
    if (code) entry['errorCode'] = code
    if (error.stack)
      entry['errorStack'] = error.stack.split(/\r?\n/).slice(0, 6).join('\n')
  } else entry['error'] = String(error)
  if (meta) entry['meta'] = meta
  return entry
}

/**
 * Records an error that the caller has decided not to propagate. Falls back to
 * stderr when no log file is known or the log itself fails.
 */
export const logSafeError = async (
  context: string,
  error: unknown,
  options?: SafeLogOptions,
): Promise<void> => {
  const entry = toLogEntry(context, error, options?.meta)
  const logPath = options?.logPath ?? fallbackLogPath
  if (!logPath) {
    console.error(`[safe] ${context}`, entry)
    return
  }
  try {
    await appendLog(logPath, entry)
  } catch (appendError) {
    console.error(`[safe] could not log ${context}`, entry, appendError)
  }
}

const report = (
  context: string,
  error: unknown,
  options: SafeLogOptions,
): Promise<void> => {
  const code = readErrorCode(error)
  if (code !== undefined && options.ignoreCodes?.includes(code))
    return Promise.resolve()
  return logSafeError(context, error, options)
}

/** Runs `fn`; on failure logs it and yields `fallback`. */
export const safe = async <T>(
  context: string,
  fn: () => T | Promise<T>,
  options: SafeLogOptions & { fallback: T },
): Promise<T> => {
  try {
    return await fn()
  } catch (error) {
    await report(context, error, options)
    return options.fallback
  }
}

/** Like `safe`, for side effects whose result nobody reads. */
export const bestEffort = async (
  context: string,
  fn: () => unknown,
  options: SafeLogOptions = {},
): Promise<void> => {
  try {
    await fn()
  } catch (error) {
    await report(context, error, options)
  }
}
