import { defaultExclude, defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/**/*.test.ts', 'pipeline/**/*.test.ts'],
    env: {
      POWERTOOLS_LOG_LEVEL: 'SILENT',
    },
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      exclude: [...defaultExclude, '**/*.test.ts', 'pipeline/bin.ts'],
    },
    testTimeout: Number(process.env.TEST_TIMEOUT ?? 5000),
  },
})
