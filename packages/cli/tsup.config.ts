import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  format: ['esm'],
  dts: { entry: 'src/index.ts' },
  clean: true,
  target: 'es2022',
  splitting: false,
  sourcemap: true,
  // The core package resolves to its TypeScript sources, so it is bundled into the executable.
  noExternal: ['@aep-ingest/core'],
  external: ['commander', 'winston', 'zod'],
});
