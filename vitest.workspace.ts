import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  {
    test: {
      name: 'gateway-core',
      include: ['packages/gateway-core/src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'observability',
      include: ['packages/observability/src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'bridge',
      include: ['modules/bridge/src/__tests__/**/*.test.ts'],
      testTimeout: 10_000,
    },
  },
  {
    test: {
      name: 'bridge-api',
      include: ['apps/bridge-api/src/__tests__/**/*.test.ts'],
      testTimeout: 10_000,
    },
  },
])
