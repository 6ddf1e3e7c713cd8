import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Tests run against the core sources; the package's runtime entry is its build output.
    alias: [
      {
        find: /^@tfmap\/core$/,
        replacement: fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    env: {
      DEBUG_MODE: 'true',
    },
    include: ['packages/*/src/**/__tests__/**/*.test.{ts,tsx}'],
    exclude: ['dist/**', '**/dist/**', 'node_modules/**'],
  },
});
