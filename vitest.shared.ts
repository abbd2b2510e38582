import type {UserConfig} from 'vitest/config'

/**
 * Shared Vitest configuration for all packages in the tracktap workspace
 *
 * Note: This file contains common settings that are inherited by package configs
 * Cannot use 'extends' with projects config, so packages import these settings directly
 */
export const sharedConfig = {
  // Test file patterns
  include: ['src/**/*.{test,spec}.ts'],
  exclude: ['**/node_modules/**', '**/dist/**', '**/build/**', '**/.{idea,git,cache,output,temp}/**'],

  // Coverage configuration (target 80%)
  coverage: {
    provider: 'v8',
    reporter: ['text', 'json', 'html', 'lcov'],
    reportsDirectory: './coverage',
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/*.config.{js,ts,mjs,mts}',
      '**/*.d.ts',
      '**/test-setup.ts',
      '**/__tests__/**',
      '**/fixtures/**',
    ],
    thresholds: {
      lines: 80,
      functions: 80,
      branches: 80,
      statements: 80,
    },
  },

  // Test timeout (30 seconds)
  testTimeout: 30000,
  hookTimeout: 30000,

  // Globals (for better DX)
  globals: true,

  // Test isolation
  isolate: true,

  // Pool options
  pool: 'threads',

  // Disable watch mode by default (CI friendly)
  watch: false,

  // Clear mocks between tests
  clearMocks: true,
  restoreMocks: true,
} satisfies UserConfig['test']
