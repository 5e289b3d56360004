import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'error',
    },
    testTimeout: 10000,
  },
})
