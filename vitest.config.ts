import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src';

export default defineConfig(
  defineBaseConfig({
    test: {
      include: [
        'tools/*/src/**/*.test.ts',
        'packages/*/src/**/*.test.ts',
        'apps/*/src/**/*.test.ts',
      ],
    },
  }),
);
