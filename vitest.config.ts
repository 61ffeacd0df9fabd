import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          root: './src',
          include: ['**/*.test.ts'],
          environment: 'node',
        }
      }
    ]
  }
})
