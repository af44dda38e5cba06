import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli/**'],
    },
    testTimeout: 15000,
    hookTimeout: 15000,
    pool: 'forks',
    setupFiles: ['./tests/vitest.setup.ts'],
    sequence: {
      shuffle: false,
    },
  },
});
