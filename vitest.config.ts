import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for citegate.
 *
 * Tests live beside their sources under `__tests__/`. Everything runs in
 * process: routers and planners are fakes, SQLite uses temp files or
 * `:memory:`.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
