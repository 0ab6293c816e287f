import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@gridplan\/engine\/testing$/, replacement: source('./engine/src/testing/index.ts') },
      { find: /^@gridplan\/engine$/, replacement: source('./engine/src/index.ts') },
    ],
  },
  test: {
    include: ['engine/src/tests/**/*.spec.ts', 'cli/src/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
