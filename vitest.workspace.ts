import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/html-tools/vitest.config.ts',
  'packages/schema-store/vitest.config.ts',
  'packages/fixtures/vitest.config.ts',
  'apps/service/vitest.config.ts'
]);
