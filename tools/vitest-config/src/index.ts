import type { UserConfig } from 'vitest/config';

/**
 * Shared Vitest settings for every workspace.
 *
 * `options.test` is merged over the base test block, the rest of `options`
 * is spread on top of the returned config.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: false,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
        thresholds: {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
      ...options.test,
    },
  };
};
