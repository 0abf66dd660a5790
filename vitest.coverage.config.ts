import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['**/__tests__/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['apps/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        'apps/monitor-service/src/index.ts',
        '**/*.d.ts',
        '**/types.ts',
      ],
      thresholds: {
        lines: 90,
        statements: 90,
      },
    },
  },
});
