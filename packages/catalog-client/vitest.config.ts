import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @tracktap/catalog-client
 * Environment: node (fetch is stubbed per test file)
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    name: 'catalog-client',
    environment: 'node',

    coverage: {
      ...sharedConfig.coverage,
      include: ['src/**/*.ts'],
      exclude: [...(sharedConfig.coverage?.exclude ?? []), 'src/**/*.{test,spec}.ts', 'src/index.ts'],
    },
  },
})
