import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/tests/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist',
      '.git'
    ]
  },
  resolve: {
    alias: {
      '@pagewatch/server': fileURLToPath(new URL('./packages/server/src/index.ts', import.meta.url))
    }
  }
})
