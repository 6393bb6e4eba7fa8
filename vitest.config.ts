import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  // Path aliases matching tsconfig
  resolve: {
    alias: {
      '@core': fromRoot('./packages/core/src'),
      '@filters': fromRoot('./packages/filters/src/index.ts'),
      '@mapper': fromRoot('./packages/mapper/src/index.ts'),
      '@wire': fromRoot('./packages/wire/src/index.ts'),
      '@transport': fromRoot('./packages/transport/src/index.ts'),
    },
  },

  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/**/*.test.ts'],
    environment: 'node',
  },
});
