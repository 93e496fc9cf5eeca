import { defineConfig } from 'vitest/config';

/**
 * Everything here is a pure unit test: no terminal, network or ssh.
 *
 *   - src/**      co-located module tests
 *   - tests/ui/** Ink component tests (rendered through ink-testing-library)
 */
export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 15000,
    include: ['src/**/*.test.ts', 'tests/**/*.test.{ts,tsx}'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
