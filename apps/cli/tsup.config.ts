import {defineConfig} from 'tsup'

export default defineConfig({
  clean: true,
  entry: ['src/index.ts'],
  format: ['esm'],
  noExternal: [/^@tracktap\//], // Bundle workspace packages; they ship TypeScript sources
  platform: 'node',
  sourcemap: true,
  splitting: false,
  target: 'node20',
  treeshake: true,
})
