import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'service',
    environment: 'node'
  },
  resolve: {
    alias: {
      '@listsmith/core/agents': resolve(__dirname, '../../packages/core/src/agents/types.ts'),
      '@listsmith/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@listsmith/model-client': resolve(__dirname, '../../packages/model-client/src/index.ts'),
      '@listsmith/listing-store': resolve(__dirname, '../../packages/listing-store/src/index.ts'),
      '@listsmith/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts')
    }
  }
});
