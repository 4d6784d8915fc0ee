import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { expect, test, vi } from 'vitest'

import { createCaseLoader, resolveCaseFile } from '../src/engine/case-loader.js'

import { createTmpDir } from './helpers/config.js'

test('resolveCaseFile names the per-suite file', () => {
  expect(resolveCaseFile('/cases', 'image')).toBe(join('/cases', 'image_cases.json'))
})

test('load keeps valid cases in file order and fills defaults', async () => {
  const casesDir = await createTmpDir('cases')
  await writeFile(
    join(casesDir, 'code_cases.json'),
    JSON.stringify({
      meta: { suite: 'code' },
      cases: [
        { id: 'C01', name: 'Clock', prompt: 'make a clock' },
        { id: 'C02', name: 'No prompt' },
        { id: 'C01', name: 'Duplicate', prompt: 'again' },
        {
          id: 'C03',
          name: 'Styled',
          category: 'ui',
          difficulty: 'extreme',
          tags: ['a', 1],
          icon: '*',
          prompt: 'style it',
        },
      ],
    }),
  )
  const log = vi.fn()

  const cases = await createCaseLoader({ casesDir, log }).load('code')

  expect(cases).toEqual([
    {
      id: 'C01',
      name: 'Clock',
      category: 'uncategorized',
      difficulty: 'medium',
      tags: [],
      icon: '📄',
      prompt: 'make a clock',
    },
    {
      id: 'C03',
      name: 'Styled',
      category: 'ui',
      difficulty: 'medium',
      tags: [],
      icon: '*',
      prompt: 'style it',
    },
  ])
  expect(log).toHaveBeenCalledTimes(2)
  expect(log).toHaveBeenCalledWith('warning: skipping duplicate code case id C01')
})

test('load returns no cases for a missing file or a file without cases', async () => {
  const casesDir = await createTmpDir('cases-missing')
  const log = vi.fn()
  const loader = createCaseLoader({ casesDir, log })

  await expect(loader.load('writing')).resolves.toEqual([])
  expect(log).toHaveBeenCalledWith(
    `warning: case file missing or unreadable: ${join(casesDir, 'writing_cases.json')}`,
  )

  await writeFile(join(casesDir, 'image_cases.json'), JSON.stringify({ meta: {} }))
  await expect(loader.load('image')).resolves.toEqual([])
  expect(log).toHaveBeenLastCalledWith(
    `warning: ${join(casesDir, 'image_cases.json')} has no "cases" array`,
  )
})
