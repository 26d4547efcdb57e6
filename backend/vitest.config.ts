import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // PGlite boots a wasm Postgres per suite
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
