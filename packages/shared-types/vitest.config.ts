import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @tracktap/shared-types
 * Environment: node (schema and validation testing)
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    name: 'shared-types',
    environment: 'node',

    // Types-specific coverage (target 90% for schema utilities)
    coverage: {
      ...sharedConfig.coverage,
      include: ['src/**/*.ts'],
      exclude: [...(sharedConfig.coverage?.exclude ?? []), 'src/**/*.{test,spec}.ts', 'src/index.ts'],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 90,
        statements: 90,
      },
    },
  },
})
