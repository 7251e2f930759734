import type { UserConfig } from 'vitest/config';

/**
 * Source globs measured by coverage
 */
export interface CoverageScope {
  include?: string[];
  exclude?: string[];
}

export const defineConfig = (
  options: UserConfig = {},
  scope: CoverageScope = {},
): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: scope.include ?? ['src/**/*.ts'],
        exclude: scope.exclude ?? ['**/index.ts', '**/*.test.ts'],
        thresholds: {
          lines: 90,
          functions: 90,
          branches: 90,
          statements: 90,
        },
      },
      ...options.test,
    },
  };
};
