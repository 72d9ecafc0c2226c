import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Use globals for describe, it, expect, etc.
    globals: true,

    // Environment for the CLI core and the terminal UI
    environment: 'node',

    // Include patterns
    include: ['**/*.test.ts', '**/*.test.tsx'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Transport and dispatch tests run real sockets
    testTimeout: 30000,

    // Hook timeout
    hookTimeout: 30000,

    // Coverage (optional)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['cli/**/*.ts', 'src/**/*.ts', 'src/**/*.tsx'],
      exclude: ['**/*.test.ts', '**/*.test.tsx', 'cli/test-utils/**'],
    },
  },
})
