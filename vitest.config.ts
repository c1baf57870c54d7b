import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@domain': fromRoot('./src/domain'),
      '@': fromRoot('./src'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts'],
    setupFiles: ['tests/setup-env.ts'],
    testTimeout: 30_000,
    server: {
      deps: {
        inline: ['gifenc'],
      },
    },
  },
});
