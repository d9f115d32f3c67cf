import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';
import { defineConfig } from 'vitest/config';

export default defineConfig(
  defineBaseConfig({
    test: {
      include: [
        'tools/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/*.{test,spec}.ts',
      ],
      coverage: {
        provider: 'v8',
        reporter: ['text'],
        include: ['tools/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
      },
    },
  }),
);
