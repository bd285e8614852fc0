import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  splitting: false,
  platform: 'node',
  target: 'node20',
  external: ['@netdiag/core', 'commander', 'ora', 'zod'],
});
