import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    // property runs enumerate long rule horizons
    testTimeout: 30_000,
    hookTimeout: 10_000,
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true },
    },
  },
})
