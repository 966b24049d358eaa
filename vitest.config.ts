import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],
    env: {
      // Keep pino on plain JSON under test so no pino-pretty worker threads are spawned
      LOG_PRETTY: 'false',
      LOG_LEVEL: 'silent',
    },
  },
})
