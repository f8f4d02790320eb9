import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core/src/**/*.test.ts'],
    environment: 'node',
    // The walker and config tests work in temp directories.
    pool: 'forks',
    restoreMocks: true
  }
});
