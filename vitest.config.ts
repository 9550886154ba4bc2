import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    globals: false,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        // Liveness tests force collection through global.gc().
        execArgv: ['--expose-gc']
      }
    }
  }
})
