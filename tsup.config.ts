import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    zod: 'src/zod/index.ts',
  },
  format: ['esm', 'cjs'],
  dts: true,
  splitting: true,
  clean: true,
  outDir: 'dist',
  external: [
    // Zod: runtime dependency of both entries, never bundled
    'zod',
  ],
  treeshake: true,
})
