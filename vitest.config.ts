/**
 * Vitest configuration for unit and integration tests.
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10_000,
  },
  resolve: {
    alias: [
      { find: /^@\/tests\/(.*)$/, replacement: `${fromRoot('./tests')}/$1` },
      { find: /^@\/(.*)$/, replacement: `${fromRoot('./src')}/$1` },
    ],
  },
});
