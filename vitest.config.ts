import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

export default defineConfig(
  defineBaseConfig(
    {
      test: {
        include: [
          'tools/*/src/**/*.{test,spec}.ts',
          'packages/*/src/**/*.{test,spec}.ts',
        ],
      },
    },
    {
      include: ['tools/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: ['**/index.ts', '**/*.test.ts', 'packages/model/src/**'],
    },
  ),
);
