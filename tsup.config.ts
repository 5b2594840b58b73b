import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'bin/ghostty-driver.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist/bundle',
  dts: true,
  clean: true,
  sourcemap: true,
  shims: true,
});
