import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',   // @pkgdb-client/core - client, stores, errors
  ],
  format: ['cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  treeshake: true,
});
