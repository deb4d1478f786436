import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['etl/test/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
  },
})
