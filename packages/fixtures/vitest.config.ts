import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'fixtures',
    environment: 'node'
  },
  resolve: {
    alias: {
      '@listsmith/core': resolve(__dirname, '../core/src/index.ts'),
      '@listsmith/model-client': resolve(__dirname, '../model-client/src/index.ts')
    }
  }
});
