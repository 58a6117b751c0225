/**
 * Vitest configuration
 *
 * Unit tests live beside their sources as *.test.ts. Nothing here needs a
 * running Spectrum or SpectroServer: the API is stubbed and the relay proxy
 * talks to loopback servers created by the tests themselves.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 5000,
    hookTimeout: 5000,
  },
})
