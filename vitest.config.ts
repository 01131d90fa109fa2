import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ucitap/chess': packageSource('chess'),
      '@ucitap/protocol': packageSource('protocol'),
      '@ucitap/core': packageSource('core'),
      '@ucitap/proxy': packageSource('proxy'),
      '@ucitap/cli': packageSource('cli'),
      '@ucitap/test-utils': packageSource('test-utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000, // 30 seconds for the process-level tests
  },
});
