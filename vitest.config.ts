import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for provenance-audit.
 *
 * Every suite is a unit suite: git is replaced by an in-process fake and the
 * history store and scanner tests write to temporary directories.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
