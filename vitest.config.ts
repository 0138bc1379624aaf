import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    testTimeout: 30000, // property tests run many async sequences
    hookTimeout: 10000,
    pool: 'forks', // better-sqlite3 is a native addon
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
  },
})
