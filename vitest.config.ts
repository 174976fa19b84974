import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const resolveFromRoot = (p: string) => path.resolve(path.dirname(fileURLToPath(import.meta.url)), p);

export default defineConfig({
  resolve: {
    alias: {
      '@gridpath/core': resolveFromRoot('packages/core/src/index.ts'),
      '@gridpath/data': resolveFromRoot('packages/data/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node'
  }
});
