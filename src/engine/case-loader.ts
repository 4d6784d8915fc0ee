import { join } from 'node:path'

import { z } from 'zod'

import { readJson } from '../fs/json.js'
import { testCaseSchema } from '../types/index.js'

import type { SuiteKind, TestCase } from '../types/index.js'

export type CaseLoader = {
  load: (kind: SuiteKind) => Promise<TestCase[]>
}

const DEFAULT_ICONS: Record<SuiteKind, string> = {
  code: '📄',
  writing: '✍️',
  image: '🖼️',
}

const caseFileSchema = z.object({
  meta: z.unknown().optional(),
  cases: z.array(z.unknown()),
})

export const resolveCaseFile = (casesDir: string, kind: SuiteKind): string =>
  join(casesDir, `${kind}_cases.json`)

/**
 * Reads `<casesDir>/<kind>_cases.json`. A missing or malformed file yields no
 * cases; individual records that fail validation, or reuse an earlier id, are
 * skipped with a log line. File order is kept.
 */
export const createCaseLoader = (params: {
  casesDir: string
  log?: (message: string) => void
}): CaseLoader => {
  const log = params.log ?? (() => undefined)
  return {
    load: async (kind) => {
      const path = resolveCaseFile(params.casesDir, kind)
      const raw = await readJson(path)
      if (raw === undefined) {
        log(`warning: case file missing or unreadable: ${path}`)
        return []
      }
      const file = caseFileSchema.safeParse(raw)
      if (!file.success) {
        log(`warning: ${path} has no "cases" array`)
        return []
      }
      const seen = new Set<string>()
      const cases: TestCase[] = []
      file.data.cases.forEach((entry, index) => {
        const parsed = testCaseSchema.safeParse(entry)
        if (!parsed.success) {
          const issue = parsed.error.issues[0]
          log(
            `warning: skipping ${kind} case #${index + 1}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
          )
          return
        }
        const { icon, ...rest } = parsed.data
        if (seen.has(rest.id)) {
          log(`warning: skipping duplicate ${kind} case id ${rest.id}`)
          return
        }
        seen.add(rest.id)
        cases.push({ ...rest, icon: icon ?? DEFAULT_ICONS[kind] })
      })
      return cases
    },
  }
}
