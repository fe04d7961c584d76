import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/main/services/**', 'src/renderer/**'],
      exclude: ['src/renderer/dashboard.ts', 'src/renderer/terminal-driver.ts'],
      thresholds: {
        // Dashboard widgets and the terminal driver need a real TTY
        lines: 60,
        functions: 60,
        branches: 50,
        statements: 60,
      },
    },
  },
});
