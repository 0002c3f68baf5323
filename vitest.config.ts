import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Use Node environment for testing CLI tools
    environment: 'node',

    // Ink switches to CI rendering (blank final frame on exit) when CI is set;
    // ink-testing-library expects interactive rendering
    env: { CI: 'false' },

    // Global test setup
    setupFiles: ['./tests/setup.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '**/*.test.ts',
        '**/*.test.tsx',
        '**/__tests__/**',
        'vitest.config.ts',
        'src/index.tsx', // Main entry point - integration tested
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 85,
        statements: 85,
      },
    },

    // Test match patterns
    include: ['src/**/*.test.{ts,tsx}'],
    exclude: ['node_modules', 'dist'],

    // Globals
    globals: true,

    // Test timeout
    testTimeout: 30000,

    // Mock cleanup between tests
    clearMocks: true,
    restoreMocks: true,
  },
});
