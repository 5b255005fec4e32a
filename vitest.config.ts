import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@hushcut\/core\/testing$/, replacement: fromRoot('./core/src/testing/index.ts') },
      { find: /^@hushcut\/core$/, replacement: fromRoot('./core/src/index.ts') },
      { find: /^@hushcut\/providers$/, replacement: fromRoot('./providers/src/index.ts') },
    ],
  },
  test: {
    include: ['core/src/**/*.test.ts', 'providers/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    environment: 'node',
  },
});
