import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/test/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // Module-level singletons (api key registry, metrics) are shared between files
    fileParallelism: false
  }
})
