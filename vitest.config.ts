import { defineConfig } from 'vitest/config';

/**
 * Test layout: tests/unit (one module each) and tests/integration
 * (full pipeline and cross-module properties).
 *
 * Coverage gate: 80% on src/
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80
      },
      exclude: [
        'tests/**',
        'dist/**',
        '**/*.config.ts',
        '**/*.d.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.test.ts'
    ]
  }
});
