import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/frontend/ast.ts',
        'src/formats/types.ts',
        'src/pipeline.ts',
      ],
      thresholds: {
        // VM fault paths are only reachable through hand-built bytecode.
        statements: 70,
        branches: 60,
        functions: 70,
        lines: 70,
      },
    },
  },
});
