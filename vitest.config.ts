import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source, not built `dist/` artifacts.
 *
 * Workspace imports are aliased back to their source entrypoints so tests
 * never need a build first.
 */
export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@netdiag/core/testing',
        replacement: path.join(repoRoot, 'packages/core/src/testing/index.ts'),
      },
      { find: '@netdiag/core', replacement: path.join(repoRoot, 'packages/core/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/**/src/**/*.test.ts'],
  },
});
