import {defineConfig} from 'tsup'

export default defineConfig({
  clean: true,
  dts: true, // Generate TypeScript declarations
  entry: ['src/index.ts'],
  external: ['@tracktap/shared-types'], // Keep workspace deps external
  format: ['esm'],
  platform: 'node', // Uses the global fetch of Node 20
  sourcemap: true,
  splitting: false,
  target: 'es2022',
  treeshake: true,
})
