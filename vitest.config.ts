import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // convergence runs take a few thousand iterations
    testTimeout: 30000,
  },
})
