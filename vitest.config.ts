import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const coreSrc = fileURLToPath(new URL('./packages/core/src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@rootbox\/core\/(.*)$/, replacement: `${coreSrc}/$1/index.ts` },
      { find: /^@rootbox\/core$/, replacement: `${coreSrc}/index.ts` },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
});
