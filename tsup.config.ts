import { defineConfig } from 'tsup';

export default defineConfig([
  {
    clean: true,
    dts: {
      entry: {
        index: 'src/index.ts',
      },
    },
    entry: {
      cli: 'src/bin/pr-creator.ts',
      index: 'src/index.ts',
    },
    format: ['esm'],
    minify: false,
    outDir: 'dist',
    platform: 'node',
    // Copies src/resources/prompts to dist/prompts
    publicDir: 'src/resources',
    shims: false,
    skipNodeModulesBundle: true,
    sourcemap: true,
    splitting: false,
    target: 'node20',
    treeshake: true,
  },
]);
