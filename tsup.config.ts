import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/chunking/index.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // Runtime dependencies stay external for the CLI and the library build
    'chalk',
    'commander',
    'openai',
    'strip-ansi',
    'yaml',
    'zod'
  ]
});
