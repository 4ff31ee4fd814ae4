import { fileURLToPath } from 'node:url'
import { defineProject } from 'vitest/config'

const setupFile = (name: string) =>
  fileURLToPath(new URL(`../scripts/vitest/setupFiles/${name}`, import.meta.url))

export const unitTestMinimalProject = defineProject({
  test: {
    name: 'unit',
    include: ['packages/**/test/unit/**/*.test.ts'],
    setupFiles: [setupFile('customMatchers.ts')],
    pool: 'forks',
    env: {
      NODE_ENV: 'test',
    },
  },
})
