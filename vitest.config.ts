import solid from 'vite-plugin-solid'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  // Resolves solid-js to its browser build under test
  plugins: [solid()],
  test: {
    environment: 'jsdom',
    include: ['packages/*/src/**/*.test.ts'],
  },
})
