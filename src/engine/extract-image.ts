import { writeFileAtomic } from '../fs/json.js'

export type ImageFormat = 'png' | 'jpg'

export type Base64Image = {
  format: ImageFormat
  payload: string
}

// Matches bare data URIs and the same URI inside `![alt](...)`.
const DATA_URI_PATTERN = /data:image\/(jpeg|png|jpg);base64,([A-Za-z0-9+/=]+)/i

const REDACT_PATTERN = /(data:image\/(?:jpeg|png|jpg);base64,)[A-Za-z0-9+/=]{100,}/gi

export const REDACTED_IMAGE = '[image data removed]'

const STRICT_BASE64 = /^[A-Za-z0-9+/]+={0,2}$/

export const findBase64Image = (text: string): Base64Image | null => {
  const match = DATA_URI_PATTERN.exec(text)
  const subtype = match?.[1]?.toLowerCase()
  const payload = match?.[2]
  if (!subtype || !payload) return null
  return { format: subtype === 'png' ? 'png' : 'jpg', payload }
}

/** Strict decode: bad alphabet, padding or length yields `null`. */
export const decodeBase64 = (payload: string): Buffer | null => {
  if (payload.length % 4 !== 0 || !STRICT_BASE64.test(payload)) return null
  const bytes = Buffer.from(payload, 'base64')
  return bytes.length > 0 ? bytes : null
}

/**
 * Writes the first embedded image to `<basePath>.<ext>` and returns the path,
 * or `null` when there is no decodable image.
 */
export const saveBase64Image = async (
  text: string,
  basePath: string,
): Promise<string | null> => {
  const image = findBase64Image(text)
  if (!image) return null
  const bytes = decodeBase64(image.payload)
  if (!bytes) return null
  const path = `${basePath}.${image.format}`
  await writeFileAtomic(path, bytes)
  return path
}

export const redactBase64Images = (text: string): string =>
  text.replace(REDACT_PATTERN, `$1${REDACTED_IMAGE}`)
