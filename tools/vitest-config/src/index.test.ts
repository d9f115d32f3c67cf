import { describe, expect, test } from 'vitest';

import rootConfig from '../../../vitest.config';
import packageConfig from '../../../packages/pdf-splitter/vitest.config';
import { defineConfig } from './index';

describe('defineConfig', () => {
  test('returns the shared defaults', () => {
    const config = defineConfig();

    expect(config.test).toMatchObject({
      environment: 'node',
      globals: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
    });
  });

  test('lets test options override the defaults', () => {
    const config = defineConfig({
      root: 'somewhere',
      test: { include: ['lib/**/*.test.ts'] },
    });

    expect(config.root).toBe('somewhere');
    expect(config.test?.include).toEqual(['lib/**/*.test.ts']);
    expect(config.test?.environment).toBe('node');
  });
});

describe('workspace configs', () => {
  test('root config runs every workspace test file', () => {
    expect(rootConfig.test?.include).toEqual([
      'tools/*/src/**/*.{test,spec}.ts',
      'packages/*/src/**/*.{test,spec}.ts',
    ]);
    expect(rootConfig.test?.globals).toBe(true);
  });

  test('package config keeps the shared defaults', () => {
    expect(packageConfig.test?.include).toEqual(['src/**/*.{test,spec}.ts']);
    expect(packageConfig.test?.environment).toBe('node');
  });
});
