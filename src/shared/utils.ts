export const nowIso = (): string => new Date().toISOString()

export const asNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms))

export const round2 = (value: number): number => Math.round(value * 100) / 100

export const elapsedSeconds = (startedAt: number, now = Date.now()): number =>
  Math.max(0, now - startedAt) / 1000

export const clip = (text: string, limit: number): string =>
  text.length > limit ? `${text.slice(0, limit)}...` : text

const INVALID_FILE_CHARS = /[<>:"/\\|?*]/g

// Safe on both Windows and POSIX; full-width parentheses are folded to ASCII.
export const sanitizeFileName = (name: string): string =>
  name
    .replace(/（/g, '(')
    .replace(/）/g, ')')
    .replace(INVALID_FILE_CHARS, '_')
    .replace(/^[\s.]+|[\s.]+$/g, '')
    .slice(0, 100)

export const formatDateStamp = (date = new Date()): string => {
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${date.getFullYear()}${month}${day}`
}
