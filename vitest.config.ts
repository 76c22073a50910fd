import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000, // 10 second default for tests
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry point: a thin wrapper over createProgram/applyCommandLine
        'src/cli.ts',
        // Type-only files
        'src/config/hooks.ts',
        '**/types.ts',
      ],
    },
  },
});
