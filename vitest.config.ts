import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./server/tests/setup.ts'],
    include: ['server/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'server/utils/deduplication/**',
        'server/middleware/**',
        'server/types/errors.ts',
        'server/routes.ts',
        'server/app.ts',
      ],
      exclude: [
        '**/node_modules/**',
        '**/tests/**',
        '**/dev/**',
        '**/*.test.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
      },
    },
  },
});
