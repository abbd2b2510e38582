import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @tracktap/cli
 * Environment: node, with the catalog faked in-process
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    name: 'cli',
    environment: 'node',
    setupFiles: ['./src/test-setup.ts'],

    coverage: {
      ...sharedConfig.coverage,
      include: ['src/**/*.ts'],
      exclude: [...(sharedConfig.coverage?.exclude ?? []), 'src/**/*.{test,spec}.ts', 'src/index.ts'],
    },
  },
})
