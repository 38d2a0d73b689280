import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/config/**/*.ts',
        'src/chunker/**/*.ts',
        'src/embedding/**/*.ts',
        'src/retrieval/**/*.ts',
        'src/search/**/*.ts',
        'src/vector-db/**/*.ts',
        'src/utils/**/*.ts',
        'src/runtime.ts',
      ],
      exclude: [
        'src/**/*.test.ts',
        'src/types/**/*.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
});
