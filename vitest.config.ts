/**
 * Vitest Configuration
 *
 * Unit tests run in Node.js beside their sources; CLI tests live in
 * cli/tests. SQLite tests use in-memory databases, HTTP is stubbed.
 *
 * Usage:
 *   npm test  - Single run
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'lib/**/*.test.ts',
      'db/**/*.test.ts',
      'types/**/*.test.ts',
      'scrobble/**/*.test.ts',
      'cli/tests/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', 'dist'],
    testTimeout: 10_000,
    pool: 'forks',
  },
})
