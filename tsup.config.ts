import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  bundle: true,
  sourcemap: true,
  minify: false,
  clean: true,
  // Cloud SDK clients stay external; they resolve from node_modules at run time.
  external: [/^@aws-sdk\//, /^@azure\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
