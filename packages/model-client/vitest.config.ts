import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'model-client',
    environment: 'node'
  }
});
