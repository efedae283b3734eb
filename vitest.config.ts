import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    // Placeholders so the environment schema parses; nothing connects during tests
    env: {
      DB_USER: 'garagedoor',
      DB_PASSWORD: 'test-secret',
      DB_NAME: 'garagedoor_test',
    },
  },
})
