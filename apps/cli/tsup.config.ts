import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  dts: false,
  shims: true,
  splitting: false,
  treeshake: true,
  noExternal: [/^@netsettle\//],
  external: ['better-sqlite3'],
  banner: {
    js: 'import { createRequire } from "module"; const require = createRequire(import.meta.url);',
  },
});
