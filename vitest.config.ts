import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'apps/harvester/src/**/*.{test,spec}.ts',
      'packages/logger/src/**/*.{test,spec}.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['apps/harvester/src/test-no-network.setup.ts'],
    testTimeout: 10000,
  },
})
