import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['src/**/*.test.ts'],
    env: {
      TZ: 'UTC'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      exclude: [
        'node_modules',
        'dist',
        '*.config.*',
        '**/*.test.ts',
        '**/*.d.ts',
        'src/index.ts',
        'src/cli.ts'
      ]
    },
    testTimeout: 10000,
  }
});
