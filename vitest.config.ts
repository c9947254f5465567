import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    env: {
      NVIM_RPC_LOG_LEVEL: 'silent'
    }
  }
})
