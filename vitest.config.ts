import {defineConfig} from 'vitest/config'

import {sharedConfig} from './vitest.shared'

/**
 * Root Vitest configuration for the tracktap workspace
 *
 * Runs every package with `npm test`; target one with `npx vitest --project cli`
 */
export default defineConfig({
  test: {
    ...sharedConfig,

    // Each package keeps its own config
    projects: [
      './packages/shared-types/vitest.config.ts',
      './packages/catalog-client/vitest.config.ts',
      './apps/cli/vitest.config.ts',
    ],
  },
})
