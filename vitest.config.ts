/**
 * Vitest configuration for kindling
 *
 * Every test runs in process: the store is a MemoryAdapter and the cache a
 * MemoryCacheClient.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    pool: 'forks',
    poolOptions: {
      forks: {
        isolate: true, // fresh model registry per file
      },
    },
    sequence: {
      shuffle: false,
    },
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 30000,
  },
})
