export type HtmlExtraction = {
  html: string | null
  complete: boolean
}

// Whole documents first, in priority order.
const COMPLETE_PATTERNS: readonly RegExp[] = [
  /```html\r?\n([\s\S]*?<\/html>)\s*\r?\n```/i,
  /```\r?\n(<!DOCTYPE html>[\s\S]*?<\/html>)\s*\r?\n```/i,
  /(<!DOCTYPE html>[\s\S]*?<\/html>)/i,
]

// Truncated documents: from the opening tag to the fence end or text end.
const PARTIAL_PATTERNS: readonly RegExp[] = [
  /```html\r?\n(<!DOCTYPE html>[\s\S]*?)(?:\r?\n```|$)/i,
  /```html\r?\n(<html[\s\S]*?)(?:\r?\n```|$)/i,
  /(<!DOCTYPE html>[\s\S]*)$/i,
]

export const isHtmlComplete = (html: string): boolean =>
  html.trim().toLowerCase().endsWith('</html>')

const firstMatch = (
  text: string,
  patterns: readonly RegExp[],
): string | null => {
  for (const pattern of patterns) {
    const captured = pattern.exec(text)?.[1]
    if (captured === undefined) continue
    const html = captured.trim()
    if (html) return html
  }
  return null
}

/**
 * Locates an HTML document inside free-form model output. Heuristic and
 * pattern based; `complete` is true when the extracted text ends with
 * `</html>`.
 */
export const extractHtml = (text: string): HtmlExtraction => {
  const html =
    firstMatch(text, COMPLETE_PATTERNS) ?? firstMatch(text, PARTIAL_PATTERNS)
  if (html === null) return { html: null, complete: false }
  return { html, complete: isHtmlComplete(html) }
}
