import type { UserConfig } from 'vitest/config';

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;

  return {
    ...rest,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.{ts,js,mjs}'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['**/src/**/*.ts'],
        exclude: ['**/index.ts', '**/main.ts', '**/*.test.ts'],
      },
      ...test,
    },
  };
};
