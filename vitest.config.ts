import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
  },
})
