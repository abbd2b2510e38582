import {defineConfig} from 'tsup'

export default defineConfig({
  clean: true,
  dts: true, // Generate TypeScript declarations
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'neutral', // Schema code for any runtime
  sourcemap: true,
  splitting: false,
  target: 'es2022',
  treeshake: true,
})
