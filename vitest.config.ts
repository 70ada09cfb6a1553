import { defineConfig } from 'vitest/config';

process.env.NODE_NO_WARNINGS ??= '1';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks',
    env: {
      WAYPOINT_LOG_LEVEL: 'silent',
    },
  },
});
