import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['packages/index.ts'],
  format: ['esm'],
  dts: false,
  shims: true,
  splitting: false,
  external: [
    'chevrotain',
    'smol-toml',
    'zod',
  ],
  outDir: 'dist/bundle',
});
