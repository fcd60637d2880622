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
      '@strata/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@strata/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts'),
      '@strata/html-tools': resolve(__dirname, '../../packages/html-tools/src/index.ts'),
      '@strata/schema-store': resolve(__dirname, '../../packages/schema-store/src/index.ts')
    }
  }
});
