import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/model-client/vitest.config.ts',
  'packages/listing-store/vitest.config.ts',
  'packages/fixtures/vitest.config.ts',
  'apps/service/vitest.config.ts'
]);
