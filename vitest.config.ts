/**
 * Vitest Configuration for version-sync
 *
 * Unit tests live in tests/unit, end-to-end runs against an in-process
 * Uptime Kuma stand-in in tests/e2e.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 10000,

    // Enable globals for describe, it, expect
    globals: true,

    environment: 'node',
  },
});
