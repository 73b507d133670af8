import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^src\//, replacement: `${fromRoot('./src')}/` },
      { find: /^types$/, replacement: fromRoot('./types.ts') },
      { find: /^index$/, replacement: fromRoot('./index.ts') },
    ],
  },
  test: {
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
