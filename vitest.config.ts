/// <reference types="vitest" />
import { defineConfig } from 'vite';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    // Use forks instead of threads - they clean up more reliably
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        isolate: true,
      },
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    exclude: ['node_modules/**', 'dist/**', 'coverage/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      all: true,
      include: ['src/**/*.ts'],
      exclude: [
        '**/index.ts', // re-exports only
        '**/*.test.ts',
        'src/cli/show-config.ts', // bin wrapper around runShowConfig
        'src/types/descriptor.ts',
        'src/types/environment.ts',
        'src/sources/document-source.ts',
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 75,
        statements: 85,
      },
    },
  },
});
