/**
 * Test setup for @tracktap/cli
 * Node environment; catalog access is always faked in-process
 */

import {afterEach, beforeEach, vi} from 'vitest'

beforeEach(() => {
  vi.clearAllMocks()
})

afterEach(() => {
  vi.unstubAllGlobals()
})
