import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * routespec - Vitest configuration
 *
 * One run covers every workspace package:
 * - colocated unit tests under src/ (*.test.ts, __tests__/)
 * - package-level suites under test/ (*.spec.ts)
 */

const getPoolConfig = (): { pool: 'threads' | 'forks' } => ({
  pool: process.platform === 'win32' ? 'threads' : 'forks',
});

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    ...getPoolConfig(),

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,

    // Property-based suites sample a few hundred values per run
    testTimeout: isCI ? 30000 : 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
